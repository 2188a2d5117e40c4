import type { Config } from '../config/index.js';
import type { BackendSet } from '../router/router.types.js';
import type { Backend, ChatMessage, CompletionOptions, CompletionResult } from './types.js';
import * as googleProvider from './providers/google.provider.js';
import { ConfigurationError } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface GeminiBackendOptions extends CompletionOptions {
  /** Backend name, defaults to the model id */
  name?: string;
  model: string;
  apiKey: string;
  /** Sent as system instruction with every prompt */
  instructions?: string;
}

/**
 * Backend that answers a single prompt with one Gemini completion.
 */
export function createGeminiBackend(options: GeminiBackendOptions): Backend {
  const { model, apiKey, instructions, temperature, maxTokens } = options;
  const name = options.name ?? model;

  return {
    name,
    async invoke(prompt: string): Promise<CompletionResult> {
      const messages: ChatMessage[] = [];
      if (instructions) {
        messages.push({ role: 'system', content: instructions });
      }
      messages.push({ role: 'user', content: prompt });

      logger.debug('LLM request', { backend: name, model, promptLength: prompt.length });

      const result = await googleProvider.createCompletion({ apiKey }, model, messages, {
        temperature,
        maxTokens,
      });

      logger.debug('LLM response', { backend: name, model, tokensUsed: result.tokensUsed });

      return result;
    },
  };
}

/**
 * Fast (flash) and advanced (pro) Gemini backends from configuration.
 */
export function createBackendSet(config: Config): BackendSet {
  if (!config.google.apiKey) {
    throw new ConfigurationError('GOOGLE_API_KEY environment variable is required');
  }

  const shared = {
    apiKey: config.google.apiKey,
    temperature: config.google.temperature,
    instructions: config.agent.instructions,
  };

  return {
    fast: createGeminiBackend({ ...shared, model: config.google.fastModel }),
    advanced: createGeminiBackend({ ...shared, model: config.google.advancedModel }),
  };
}
