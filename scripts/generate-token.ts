/**
 * Dispatch the agent to a room and print a participant token.
 *
 * Usage:
 *   npm run token -- [room] [participant]
 */

import dotenv from 'dotenv';
import { loadConfig } from '../src/config/index.js';
import { dispatchAgentToRoom, generateToken, getLivekitUrl } from '../src/livekit/index.js';
import { getErrorMessage } from '../src/utils/errors.js';
import logger from '../src/utils/logger.js';

const PLAYGROUND_URL = 'https://agents-playground.livekit.io/';

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  const [roomArg, participantArg] = process.argv.slice(2);
  const participantName = participantArg || 'user-1';

  const roomName = await dispatchAgentToRoom(config, roomArg || config.agent.defaultRoom);
  const jwt = await generateToken(config, roomName, participantName);

  console.log('\n=== LiveKit Playground Configuration ===\n');
  console.log(`1. Go to: ${PLAYGROUND_URL}\n`);
  console.log('2. Enter these details:');
  console.log(`   LiveKit URL: ${getLivekitUrl(config)}\n`);
  console.log('3. Paste this token:\n');
  console.log(jwt);
  console.log("\n4. Click 'Connect' and start talking!\n");
}

main().catch((error) => {
  logger.error('Failed to dispatch agent', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
