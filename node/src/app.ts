import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppConfig } from '@/config/app.config';
import type { PipelineDeps } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { requestTimeout } from '@/stability/errorHandlers';
import { createFlightRoutes } from '@/routes/flights';
import { createPolicyRoutes } from '@/routes/policy';
import { createChatRoutes } from '@/routes/chat';

export function createApp(deps: PipelineDeps, config: AppConfig): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '100kb' }));
  app.use(attachCorrelationId);
  app.use(requestTimeout(30000));

  if (config.nodeEnv !== 'test') {
    // Request lines go through the same logger as everything else.
    app.use(
      morgan(config.nodeEnv === 'development' ? 'dev' : 'combined', {
        stream: { write: (line: string) => logger.info(line.trimEnd()) },
      }),
    );
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      flights: deps.assistant.catalog.size,
    });
  });

  app.use('/api/flights', createFlightRoutes(deps.assistant));
  app.use('/api/policy', createPolicyRoutes(deps.assistant));
  app.use('/api/chat', createChatRoutes(deps.dispatcher));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
