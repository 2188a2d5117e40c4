/**
 * Route Decision
 *
 * | Priority | Label     | Role     |
 * |----------|-----------|----------|
 * | 1        | simple    | fast     |
 * | 2        | complex   | advanced |
 * | 3        | technical | advanced |
 * | 4        | creative  | advanced |
 * | 5        | general   | fast     |
 *
 * Priority is enforced by the classifier returning the first matching label.
 */

import type { ClassificationLabel } from '../router.types.js';
import type { BackendRole } from '../../llm/types.js';

export interface RouteDecisionOutput {
  role: BackendRole;
  reason: string;
}

const ROUTE_TABLE: Record<ClassificationLabel, RouteDecisionOutput> = {
  simple: { role: 'fast', reason: 'Simple factual query' },
  complex: { role: 'advanced', reason: 'Complex reasoning query' },
  technical: { role: 'advanced', reason: 'Technical/coding query' },
  creative: { role: 'advanced', reason: 'Creative query' },
  general: { role: 'fast', reason: 'General query' },
};

export function determineRoute(label: ClassificationLabel): RouteDecisionOutput {
  return ROUTE_TABLE[label];
}

/**
 * Reason string as recorded in the interaction log
 */
export function describeRoute(route: RouteDecisionOutput, backendName: string): string {
  return `${route.reason} - using ${backendName}`;
}
