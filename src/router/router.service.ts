/**
 * Router Service
 *
 * Classifies the query, selects one backend and calls it once with the raw
 * text. A failing backend never surfaces as an exception here: its message
 * becomes the reply, so the voice pipeline keeps speaking.
 */

import type { BackendSet, RoutingDecision } from './router.types.js';
import { BACKEND_ERROR_PREFIX } from './router.types.js';
import { explainClassification } from './rules/query-classifier.js';
import { determineRoute, describeRoute } from './rules/route-decision.js';
import { getErrorMessage } from '../utils/errors.js';
import { toResponseText } from '../utils/text.js';
import logger from '../utils/logger.js';

function hasContent(value: unknown): value is { content: unknown } {
  return typeof value === 'object' && value !== null && 'content' in value;
}

/**
 * Text payload of a backend reply: its `content` field when present,
 * otherwise the reply itself, rendered as response text.
 */
export function toBackendText(value: unknown): string {
  return toResponseText(hasContent(value) ? value.content : value);
}

export function formatBackendError(error: unknown): string {
  return `${BACKEND_ERROR_PREFIX} ${getErrorMessage(error)}`;
}

export async function route(text: string, backends: BackendSet): Promise<RoutingDecision> {
  const classification = explainClassification(text);
  const routeResult = determineRoute(classification.label);
  const backend = backends[routeResult.role];
  const reason = describeRoute(routeResult, backend.name);

  logger.debug('Router classification', {
    label: classification.label,
    patterns: classification.matchedPatterns.slice(0, 5),
  });

  const startTime = Date.now();
  let responseText: string;
  let failed = false;

  try {
    const response = await backend.invoke(text);
    responseText = toBackendText(response);
  } catch (error) {
    failed = true;
    responseText = formatBackendError(error);
    logger.warn('Backend call failed', {
      backend: backend.name,
      error: getErrorMessage(error),
    });
  }

  const decision: RoutingDecision = Object.freeze({
    backendName: backend.name,
    role: routeResult.role,
    label: classification.label,
    reason,
    responseText,
    failed,
    durationMs: Date.now() - startTime,
  });

  logger.info('Router decision', {
    backend: decision.backendName,
    role: decision.role,
    label: decision.label,
    failed: decision.failed,
    timeMs: decision.durationMs,
    reason: routeResult.reason,
  });

  return decision;
}
