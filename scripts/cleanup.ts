/**
 * Delete all rooms and agent dispatches on the configured server.
 *
 * Usage:
 *   npm run cleanup
 */

import dotenv from 'dotenv';
import { loadConfig } from '../src/config/index.js';
import { cleanupAll } from '../src/livekit/index.js';
import { getErrorMessage } from '../src/utils/errors.js';
import logger from '../src/utils/logger.js';

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  const result = await cleanupAll(config);
  logger.info('Cleanup complete', { ...result });
}

main().catch((error) => {
  logger.error('Error during cleanup', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
