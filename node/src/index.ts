// Load environment variables FIRST
import 'dotenv/config';

import { loadConfig } from '@/config/app.config';
import { createPipelineDeps } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';
import { createApp } from './app';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

const startServer = async (): Promise<void> => {
  const config = loadConfig();

  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const deps = await createPipelineDeps(config);
  const app = createApp(deps, config);

  const server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`Flights loaded: ${deps.assistant.catalog.size}`);
  });
  setServerInstance(server);
};

startServer().catch((error: unknown) => {
  logger.fatal('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
