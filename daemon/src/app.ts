import express from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { logger } from './logger';
import { createApiRouter } from './routes';
import { errorHandler } from './middleware/errorHandler';
import type { ApiDeps } from './routes';

export interface AppOptions {
  corsOrigin: string;
}

export function createApp(deps: ApiDeps, options: AppOptions): express.Express {
  const app = express();

  // CORS: the menu bar UI runs on its own dev origin
  app.use(cors({
    origin: options.corsOrigin,
    credentials: true,
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use(pinoHttp({
    logger,
    genReqId: () => uuidv4(),
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/v1', createApiRouter(deps));

  app.use(errorHandler);

  return app;
}
