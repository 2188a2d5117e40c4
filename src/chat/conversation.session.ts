/**
 * Conversation Session
 *
 * Owns a fast and an advanced backend plus an append-only log of every turn.
 * One session per voice job; sessions share nothing.
 */

import type { Backend } from '../llm/types.js';
import type { BackendSet, ClassificationLabel } from '../router/router.types.js';
import { route } from '../router/router.service.js';
import { ConfigurationError } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface InteractionRecord {
  userText: string;
  assistantText: string;
  backendName: string;
  reason: string;
  label: ClassificationLabel;
  timestamp: Date;
}

export interface ConversationSessionOptions {
  /**
   * Keep only the newest N records. Unbounded when omitted, which is fine for
   * voice jobs that last minutes; set it for long-lived sessions.
   */
  historyLimit?: number;
}

function isBackend(value: unknown): value is Backend {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    'invoke' in value &&
    typeof value.invoke === 'function'
  );
}

function validateBackends(backends: Partial<BackendSet>): BackendSet {
  const missing: string[] = [];
  if (!isBackend(backends.fast)) missing.push('fast');
  if (!isBackend(backends.advanced)) missing.push('advanced');

  if (!isBackend(backends.fast) || !isBackend(backends.advanced)) {
    throw new ConfigurationError(
      'Backend set must provide a fast and an advanced backend',
      missing.map(role => `missing ${role} backend`)
    );
  }

  return { fast: backends.fast, advanced: backends.advanced };
}

export class ConversationSession {
  private readonly backends: BackendSet;
  private readonly historyLimit?: number;
  private readonly history: InteractionRecord[] = [];
  // Turns run strictly one after another, in call order
  private queue: Promise<unknown> = Promise.resolve();

  constructor(backends: Partial<BackendSet>, options: ConversationSessionOptions = {}) {
    this.backends = validateBackends(backends);

    if (options.historyLimit !== undefined) {
      if (!Number.isInteger(options.historyLimit) || options.historyLimit < 1) {
        throw new ConfigurationError(`historyLimit must be a positive integer, got ${options.historyLimit}`);
      }
      this.historyLimit = options.historyLimit;
    }
  }

  /**
   * Route one user message and return the reply text.
   * Resolves with an "Error calling model: ..." sentence when the backend fails.
   */
  invoke(text: string): Promise<string> {
    const turn = this.queue.then(() => this.runTurn(text));
    // Keep the chain alive after a failed turn; the caller still sees the rejection
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  /**
   * Name of the backend that answered the latest turn, or "none"
   */
  lastBackendUsed(): string {
    const last = this.history[this.history.length - 1];
    return last ? last.backendName : 'none';
  }

  getHistory(): readonly InteractionRecord[] {
    return [...this.history];
  }

  get size(): number {
    return this.history.length;
  }

  private async runTurn(text: string): Promise<string> {
    const decision = await route(text, this.backends);

    this.history.push(Object.freeze({
      userText: text,
      assistantText: decision.responseText,
      backendName: decision.backendName,
      reason: decision.reason,
      label: decision.label,
      timestamp: new Date(),
    }));

    if (this.historyLimit !== undefined && this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    logger.debug('Conversation turn recorded', {
      backend: decision.backendName,
      turns: this.history.length,
    });

    return decision.responseText;
  }
}
