import { Router, Request, Response } from 'express';
import type { Logger } from 'pino';
import type { MockCoreState } from '../state';

const MODES = ['global', 'rule', 'direct'];

export function createConfigsRouter(state: MockCoreState, logger: Logger): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      port: state.ports.port,
      'socks-port': state.ports.socksPort,
      'mixed-port': state.ports.mixedPort,
      mode: state.mode,
    });
  });

  router.patch('/', (req: Request, res: Response) => {
    const mode: unknown = req.body?.mode;
    if (mode !== undefined) {
      if (typeof mode !== 'string' || !MODES.includes(mode.toLowerCase())) {
        return res.status(400).json({ message: 'Body invalid' });
      }
      logger.info({ module: 'routes.configs', old_mode: state.mode, new_mode: mode }, 'Mode changed');
      state.mode = mode.toLowerCase();
    }
    res.status(204).end();
  });

  return router;
}
