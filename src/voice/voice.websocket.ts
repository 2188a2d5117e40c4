/**
 * Voice WebSocket bridge
 *
 * Each connection is one voice job: a client (speech front end, test
 * harness) sends chat turns as JSON text frames and receives the routed reply
 * as chunk frames. Speech-to-text and text-to-speech stay on the client.
 */

import { WebSocketServer, type RawData } from 'ws';
import type { IncomingMessage } from 'http';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { AppContext } from '../app-context.js';
import type { ChatItem } from './chat-context.js';
import { textItem, toChatItems } from './chat-context.js';
import type { ChatChunk, ChunkSink } from './llm-stream.js';
import { runVoiceSession, type AutoSubscribe, type VoiceAgent, type VoiceJob } from './voice.agent.js';
import { getErrorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

const WS_OPEN = 1;

/**
 * The part of a ws WebSocket the bridge relies on
 */
export interface VoiceSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

const inboundMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chat'),
    messages: z.array(z.unknown()),
  }),
  z.object({
    type: z.literal('text'),
    text: z.string(),
  }),
]);

type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type OutboundMessage =
  | { type: 'status'; status: 'thinking' }
  | { type: 'chunk'; chunk: ChatChunk }
  | { type: 'text_done' }
  | { type: 'error'; error: string };

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export function parseInboundMessage(text: string): InboundMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const result = inboundMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}

export function toTurnItems(message: InboundMessage): ChatItem[] {
  return message.type === 'text'
    ? [textItem('user', message.text)]
    : toChatItems(message.messages);
}

/**
 * Room name from `?room=` on the upgrade request, else a generated one
 */
export function resolveRoomName(req: Pick<IncomingMessage, 'url'>): string {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const room = url.searchParams.get('room')?.trim();
  return room ? room : `voice-${uuidv4()}`;
}

/**
 * VoiceJob backed by an already-open WebSocket.
 */
export class WebSocketVoiceJob implements VoiceJob {
  private agent: VoiceAgent | null = null;
  private turns: Promise<void> = Promise.resolve();
  private readonly completed: Promise<void>;

  constructor(
    private readonly ws: VoiceSocket,
    readonly roomName: string
  ) {
    this.completed = new Promise(resolve => {
      ws.on('close', () => {
        logger.info('Voice WebSocket closed', { room: roomName });
        resolve();
      });
    });

    ws.on('error', (err) => {
      logger.error('Voice WebSocket error', { room: roomName, error: err.message });
    });

    ws.on('message', (data, isBinary) => {
      this.handleFrame(data, isBinary);
    });
  }

  async connect(options: { autoSubscribe: AutoSubscribe }): Promise<void> {
    if (this.ws.readyState !== WS_OPEN) {
      throw new Error(`Voice WebSocket for room ${this.roomName} is not open`);
    }
    logger.debug('Voice WebSocket job connected', {
      room: this.roomName,
      autoSubscribe: options.autoSubscribe,
    });
  }

  async startSession(agent: VoiceAgent): Promise<void> {
    this.agent = agent;
  }

  waitForCompletion(): Promise<void> {
    return this.completed;
  }

  async disconnect(): Promise<void> {
    if (this.ws.readyState === WS_OPEN) {
      this.ws.close();
    }
  }

  private send(message: OutboundMessage): void {
    if (this.ws.readyState === WS_OPEN) {
      this.ws.send(JSON.stringify(message));
    }
  }

  private handleFrame(data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.send({ type: 'error', error: 'Audio frames are not supported' });
      return;
    }

    const message = parseInboundMessage(rawDataToString(data));
    if (!message) {
      logger.warn('Invalid voice WebSocket message', { room: this.roomName });
      this.send({ type: 'error', error: 'Invalid message' });
      return;
    }

    const items = toTurnItems(message);
    this.turns = this.turns.then(() => this.processTurn(items));
  }

  private async processTurn(items: ChatItem[]): Promise<void> {
    const agent = this.agent;
    if (!agent) {
      this.send({ type: 'error', error: 'Session not started' });
      return;
    }

    this.send({ type: 'status', status: 'thinking' });

    const sink: ChunkSink = {
      send: chunk => this.send({ type: 'chunk', chunk }),
      end: () => this.send({ type: 'text_done' }),
    };

    try {
      const stream = await agent.llm.chat({ items });
      await stream.pipeTo(sink);
    } catch (error) {
      logger.error('Voice turn failed', { room: this.roomName, error: getErrorMessage(error) });
      this.send({ type: 'error', error: 'Thinking failed' });
    }
  }
}

export async function handleVoiceWsConnection(
  ws: VoiceSocket,
  req: Pick<IncomingMessage, 'url'>,
  appContext: AppContext
): Promise<void> {
  const job = new WebSocketVoiceJob(ws, resolveRoomName(req));

  try {
    await runVoiceSession(job, appContext);
  } catch (error) {
    logger.error('Voice session failed', { room: job.roomName, error: getErrorMessage(error) });
  }
}

export function startVoiceServer(appContext: AppContext): WebSocketServer {
  const { port, path } = appContext.config.voice;
  const wss = new WebSocketServer({ port, path });

  wss.on('connection', (ws, req) => {
    logger.info('Voice WebSocket connected', { url: req.url });
    void handleVoiceWsConnection(ws, req, appContext);
  });

  wss.on('listening', () => {
    logger.info('Voice WebSocket server listening', { port, path });
  });

  return wss;
}

/**
 * The parts of a WebSocketServer needed to shut it down.
 */
export interface ClosableServer {
  clients: Iterable<{ terminate(): void }>;
  close(cb?: (err?: Error) => void): void;
}

/**
 * Drop every open connection, then close the server. `close` alone waits
 * for clients to hang up on their own.
 */
export function stopVoiceServer(wss: ClosableServer): Promise<void> {
  for (const client of wss.clients) {
    client.terminate();
  }
  return new Promise((resolve, reject) => {
    wss.close(err => (err ? reject(err) : resolve()));
  });
}
