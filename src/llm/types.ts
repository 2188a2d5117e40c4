// LLM Backend Types

export type ProviderId = 'google';

/**
 * Routing role a backend is configured for
 */
export type BackendRole = 'fast' | 'advanced';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionResult {
  content: string;
  tokensUsed: number;
  model: string;
  provider: ProviderId;
}

/**
 * A named text-generation capability.
 *
 * `invoke` resolves to whatever the underlying client returns. The router
 * reads a string `content` field when there is one and stringifies anything
 * else. A rejection is treated as a failed call.
 */
export interface Backend {
  readonly name: string;
  invoke(prompt: string): Promise<unknown>;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}
