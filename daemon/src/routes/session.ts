import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { parseBody } from '../middleware/validate';
import { PROXY_MODES } from '../types';
import type { SessionOrchestrator } from '../services/sessionOrchestrator';

const modeBody = z.object({
  mode: z.enum(['global', 'rule', 'direct'], {
    errorMap: () => ({ message: `mode must be one of ${PROXY_MODES.join(', ')}` }),
  }),
});

const systemProxyBody = z.object({
  enabled: z.boolean(),
});

export type SessionService = Pick<
  SessionOrchestrator,
  'snapshot' | 'startProxy' | 'stopProxy' | 'toggleProxy' | 'restartProxy' | 'setMode' | 'setSystemProxy'
>;

export function createSessionRouter(session: SessionService): Router {
  const router = Router();

  // GET /api/v1/session
  router.get('/', (_req: Request, res: Response) => {
    res.json({ data: session.snapshot() });
  });

  // POST /api/v1/session/start
  router.post('/start', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await session.startProxy();
      res.json({ data: { result, session: session.snapshot() } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/session/stop
  router.post('/stop', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await session.stopProxy();
      res.json({ data: { result, session: session.snapshot() } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/session/toggle
  router.post('/toggle', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await session.toggleProxy();
      res.json({ data: { ...result, session: session.snapshot() } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/session/restart
  router.post('/restart', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await session.restartProxy();
      res.json({ data: { result, session: session.snapshot() } });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/session/mode
  router.put('/mode', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { mode } = parseBody(modeBody, req.body, 'routes.session');
      await session.setMode(mode);
      res.json({ data: session.snapshot() });
    } catch (err) {
      next(err);
    }
  });

  // PUT /api/v1/session/system-proxy
  router.put('/system-proxy', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { enabled } = parseBody(systemProxyBody, req.body, 'routes.session');
      await session.setSystemProxy(enabled);
      res.json({ data: session.snapshot() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

export function createTrafficRouter(session: Pick<SessionOrchestrator, 'snapshot'>): Router {
  const router = Router();

  // GET /api/v1/traffic
  router.get('/', (_req: Request, res: Response) => {
    res.json({ data: session.snapshot().traffic });
  });

  return router;
}
