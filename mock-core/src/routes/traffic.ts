import { Router, Request, Response } from 'express';
import type { MockCoreState } from '../state';

export function createTrafficRouter(state: MockCoreState): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ up: state.traffic.up, down: state.traffic.down });
  });

  return router;
}
