/**
 * Model Router
 *
 * One hop: classify the query, pick the fast or the advanced backend,
 * call it, report what happened.
 */

export { route, toBackendText, formatBackendError } from './router.service.js';

export type {
  ClassificationLabel,
  ClassificationResult,
  RoutingDecision,
  BackendSet,
} from './router.types.js';

export { BACKEND_ERROR_PREFIX } from './router.types.js';

// Individual rule modules (for testing)
export {
  classify,
  explainClassification,
  isSimpleQuery,
  isComplexQuery,
  isTechnicalQuery,
  isCreativeQuery,
  SIMPLE_MAX_WORDS,
} from './rules/query-classifier.js';
export { determineRoute, describeRoute } from './rules/route-decision.js';
