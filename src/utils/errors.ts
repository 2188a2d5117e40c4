/**
 * Typed errors
 *
 * Each error carries a stable `code` so callers can branch on it without
 * relying on class identity across module boundaries.
 */

import { toDisplayString } from './text.js';

/**
 * Thrown before any session starts when the environment or the backend set
 * is unusable. The process must not continue.
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR' as const;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown by a backend when a generation call fails. The router turns it into
 * a spoken error sentence instead of letting it reach the voice pipeline.
 */
export class BackendInvocationError extends Error {
  readonly code = 'BACKEND_INVOCATION_ERROR' as const;

  constructor(
    message: string,
    public readonly backendName: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'BackendInvocationError';
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Render any thrown value as a message string.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return toDisplayString(error);
}
