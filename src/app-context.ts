import type { Config } from './config/index.js';
import type { BackendSet } from './router/router.types.js';
import { ConversationSession } from './chat/conversation.session.js';
import { createBackendSet } from './llm/backends.js';

/**
 * Everything a voice job needs, built once at process start and passed
 * down explicitly.
 */
export interface AppContext {
  readonly config: Config;
  /** Fresh session per voice job */
  createConversationSession(): ConversationSession;
}

export function createAppContext(
  config: Config,
  backendFactory: (config: Config) => BackendSet = createBackendSet
): AppContext {
  return {
    config,
    createConversationSession() {
      return new ConversationSession(backendFactory(config), {
        historyLimit: config.agent.historyLimit,
      });
    },
  };
}
