/**
 * Voice session entry point
 *
 * Called once per voice job (one room, one connection). Binds a fresh
 * conversation session to the job and runs it until the job completes.
 */

import type { AppContext } from '../app-context.js';
import type { ConversationSession } from '../chat/conversation.session.js';
import { RoutedLLM } from './routed-llm.js';
import logger from '../utils/logger.js';

export type AutoSubscribe = 'audio_only' | 'subscribe_all' | 'subscribe_none';

export interface VoiceAgent {
  instructions: string;
  llm: RoutedLLM;
}

/**
 * One voice job as driven by the hosting platform
 */
export interface VoiceJob {
  readonly roomName: string;
  connect(options: { autoSubscribe: AutoSubscribe }): Promise<void>;
  startSession(agent: VoiceAgent): Promise<void>;
  waitForCompletion(): Promise<void>;
  disconnect(): Promise<void>;
}

export function createVoiceAgent(session: ConversationSession, instructions: string): VoiceAgent {
  return {
    instructions,
    llm: new RoutedLLM(session),
  };
}

export async function runVoiceSession(job: VoiceJob, appContext: AppContext): Promise<ConversationSession> {
  const { roomName } = job;
  logger.info('Agent received job', { room: roomName });

  const session = appContext.createConversationSession();

  try {
    await job.connect({ autoSubscribe: 'audio_only' });
    logger.info('Connected to room', { room: roomName });

    const agent = createVoiceAgent(session, appContext.config.agent.instructions);
    await job.startSession(agent);
    logger.info('Voice session started', { room: roomName });

    await job.waitForCompletion();
    logger.info('Voice session completed', { room: roomName, turns: session.size });
  } finally {
    await job.disconnect();
  }

  return session;
}
