import dotenv from 'dotenv';
import { loadConfig } from './config/index.js';
import { createAppContext, type AppContext } from './app-context.js';
import { startVoiceServer, stopVoiceServer } from './voice/voice.websocket.js';
import { getErrorMessage, isConfigurationError } from './utils/errors.js';
import logger, { setLogLevel } from './utils/logger.js';

function bootstrap(): AppContext {
  dotenv.config();

  const config = loadConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  const appContext = createAppContext(config);
  // Fail on a bad backend set before accepting any session
  appContext.createConversationSession();
  return appContext;
}

function main(): void {
  let appContext: AppContext;
  try {
    appContext = bootstrap();
  } catch (error) {
    if (isConfigurationError(error)) {
      logger.error('Configuration error, not starting', { error: error.message });
    } else {
      logger.error('Startup failed', { error: getErrorMessage(error) });
    }
    process.exit(1);
  }

  const wss = startVoiceServer(appContext);

  logger.info('Voice router agent started', {
    agent: appContext.config.agent.name,
    fastModel: appContext.config.google.fastModel,
    advancedModel: appContext.config.google.advancedModel,
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    stopVoiceServer(wss)
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main();
