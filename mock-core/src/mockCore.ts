import express, { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import pino from 'pino';
import { healthRouter } from './routes/health';
import { createTrafficRouter } from './routes/traffic';
import { createProxiesRouter } from './routes/proxies';
import { createConfigsRouter } from './routes/configs';
import { createState } from './state';
import type { MockCoreState } from './state';

export const logger = pino({ name: 'mock-core', level: process.env.LOG_LEVEL || 'info' });

export function createMockCoreApp(state: MockCoreState): express.Express {
  const app = express();
  app.use(express.json());

  // Record every call so tests can assert on what the client sent
  app.use((req: Request, _res: Response, next: NextFunction) => {
    state.requests.push({ method: req.method, path: req.originalUrl, body: req.body });
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    if (state.secret && req.headers.authorization !== `Bearer ${state.secret}`) {
      logger.warn({ module: 'mockCore', path: req.path }, 'Unauthorized request');
      return res.status(401).json({ message: 'Unauthorized' });
    }
    next();
  });

  app.use('/traffic', createTrafficRouter(state));
  app.use('/proxies', createProxiesRouter(state, logger));
  app.use('/configs', createConfigsRouter(state, logger));
  app.use('/', healthRouter);

  return app;
}

export interface RunningMockCore {
  state: MockCoreState;
  host: string;
  port: number;
  close(): Promise<void>;
}

export function startMockCore(options: { host?: string; port?: number; state?: MockCoreState } = {}): Promise<RunningMockCore> {
  const host = options.host || '127.0.0.1';
  const state = options.state || createState();
  const app = createMockCoreApp(state);

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(options.port ?? 0, host);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      logger.info({ module: 'mockCore', host, port }, 'Mock core listening');
      resolve({
        state,
        host,
        port,
        close: () => new Promise<void>((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        }),
      });
    });
  });
}
