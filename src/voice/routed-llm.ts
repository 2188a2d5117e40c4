import type { ConversationSession } from '../chat/conversation.session.js';
import type { ChatItem } from './chat-context.js';
import { DEFAULT_GREETING, extractLatestUserMessage } from './chat-context.js';
import { SingleChunkStream } from './llm-stream.js';
import logger from '../utils/logger.js';

export interface ChatRequest {
  items: readonly ChatItem[];
}

/**
 * LLM seen by the voice pipeline. Each chat turn takes the newest user
 * message, routes it through the conversation session and hands the reply
 * back as a single-chunk stream.
 */
export class RoutedLLM {
  constructor(
    readonly session: ConversationSession,
    private readonly fallbackGreeting: string = DEFAULT_GREETING
  ) {}

  async chat(request: ChatRequest): Promise<SingleChunkStream> {
    const userMessage = extractLatestUserMessage(request.items, this.fallbackGreeting);

    logger.info('Routing user message', { preview: userMessage.slice(0, 100) });

    const response = await this.session.invoke(userMessage);

    logger.info('Routed response ready', {
      length: response.length,
      backend: this.session.lastBackendUsed(),
      preview: response.slice(0, 200),
    });

    return new SingleChunkStream(response);
  }
}
