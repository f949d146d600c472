import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { config } from './config';
import { requestLogger } from './middleware/request-logger.middleware';
import { errorHandler } from './middleware/error-handler.middleware';
import { notFoundHandler } from './middleware/not-found.middleware';
import { createCheckRoutes } from './routes/check.routes';
import type { WritingAnalyzer } from './services/analysis/writing-analyzer.service';

export interface AppOptions {
  analyzer: WritingAnalyzer;
}

export function createApp({ analyzer }: AppOptions): Express {
  const app: Express = express();

  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  }));

  app.use(helmet());

  app.use(express.json({ limit: '1mb' }));

  app.use(compression());

  app.use(requestLogger);

  const health = (_req: express.Request, res: express.Response) => {
    res.json({
      status: 'ok',
      version: config.version,
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
    });
  };

  app.get('/', health);
  app.get('/health', health);

  app.use('/api', createCheckRoutes(analyzer));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
