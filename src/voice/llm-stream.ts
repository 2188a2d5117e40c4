/**
 * Single-chunk LLM stream
 *
 * The voice pipeline consumes replies as a stream of chat chunks, but the
 * router produces one finished string. This stream carries that string as
 * exactly one chunk and then ends. No token-level streaming happens here.
 */

import { v4 as uuidv4 } from 'uuid';
import { toResponseText } from '../utils/text.js';

export interface ChatChunk {
  id: string;
  delta: {
    role: 'assistant';
    content: string;
  };
}

/**
 * Downstream consumer of chunks (TTS feeder, WebSocket client, ...)
 */
export interface ChunkSink {
  send(chunk: ChatChunk): void;
  end(): void;
}

export { toResponseText };

export class SingleChunkStream implements AsyncIterable<ChatChunk> {
  readonly text: string;
  private emitted = false;
  private closed = false;

  constructor(response: unknown, private readonly createId: () => string = uuidv4) {
    this.text = toResponseText(response);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ChatChunk> {
    if (this.closed || this.emitted) {
      return;
    }
    this.emitted = true;

    yield {
      id: this.createId(),
      delta: { role: 'assistant', content: this.text },
    };

    this.closed = true;
  }

  /**
   * Forward the chunk to a sink, then end it. The sink is ended exactly once,
   * also when the stream was closed before anything was sent.
   */
  async pipeTo(sink: ChunkSink): Promise<void> {
    try {
      for await (const chunk of this) {
        sink.send(chunk);
      }
    } finally {
      this.close();
      sink.end();
    }
  }

  /**
   * Safe to call any number of times, before or after the chunk went out.
   */
  close(): void {
    this.closed = true;
  }
}
