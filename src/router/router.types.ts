/**
 * Model Router Types
 *
 * The router labels a query, picks exactly one backend for it and calls it.
 * It holds no state between calls.
 */

import type { Backend, BackendRole } from '../llm/types.js';

export type ClassificationLabel = 'simple' | 'complex' | 'technical' | 'creative' | 'general';

/**
 * Label plus the phrases that produced it (for debugging)
 */
export interface ClassificationResult {
  label: ClassificationLabel;
  matchedPatterns: string[];
}

/**
 * Outcome of one routing step. Frozen once produced.
 */
export interface RoutingDecision {
  /** Name of the backend that answered. Always one of the configured names. */
  backendName: string;

  /** Role the backend was selected for */
  role: BackendRole;

  /** Classification that drove the selection */
  label: ClassificationLabel;

  /** Human-readable reason, e.g. "Simple factual query - using gemini-2.5-flash" */
  reason: string;

  /** Backend reply, or "Error calling model: ..." when the call failed */
  responseText: string;

  /** True when responseText is the error sentence */
  failed: boolean;

  /** Wall time spent in the backend call (ms) */
  durationMs: number;
}

/**
 * Backends available to the router, keyed by role
 */
export interface BackendSet {
  fast: Backend;
  advanced: Backend;
}

export const BACKEND_ERROR_PREFIX = 'Error calling model:';
