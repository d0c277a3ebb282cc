import { config } from 'dotenv';
import { createLogger } from '@timbre/core';
import { loadConfig } from './config';
import { createVoiceConversion } from './app';

// Load environment variables
config();

const logger = createLogger('voice-conversion-main');

async function main() {
  const serviceConfig = loadConfig();
  const { server, monitor } = createVoiceConversion(serviceConfig);

  // Requests fail with MODEL_UNAVAILABLE until the engine reports loaded
  const status = await monitor.start();
  if (!status.loaded) {
    logger.warn({ retrySec: serviceConfig.engine.loadRetrySec }, 'Starting without loaded models');
  }

  await server.start(serviceConfig.port, serviceConfig.host);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    monitor.stop();
    await server.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(error => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

main().catch(error => {
  logger.error({ error }, 'Server crashed');
  process.exit(1);
});
