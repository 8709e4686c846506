import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { parseBody } from '../middleware/validate';
import type { ProfileStore } from '../services/profileStore';
import type { SessionOrchestrator } from '../services/sessionOrchestrator';

const createBody = z.object({
  name: z.string().trim().min(1, 'name is required'),
  subscriptionUrl: z.string().url().nullable().optional(),
});

const importBody = z.object({
  name: z.string().trim().min(1, 'name is required'),
  path: z.string().min(1, 'path is required'),
});

const exportBody = z.object({
  path: z.string().min(1, 'path is required'),
});

export interface ProfileRouterDeps {
  profiles: Pick<ProfileStore, 'list' | 'exportTo'>;
  session: Pick<SessionOrchestrator, 'addProfile' | 'importProfile' | 'switchProfile' | 'refreshProfile' | 'removeProfile'>;
}

export function createProfilesRouter({ profiles, session }: ProfileRouterDeps): Router {
  const router = Router();

  // GET /api/v1/profiles
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await profiles.list() });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/profiles
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name, subscriptionUrl } = parseBody(createBody, req.body, 'routes.profiles');
      res.status(201).json({ data: await session.addProfile(name, subscriptionUrl) });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/profiles/import
  router.post('/import', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(importBody, req.body, 'routes.profiles');
      res.status(201).json({ data: await session.importProfile(body.path, body.name) });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/profiles/:id/export
  router.post('/:id/export', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(exportBody, req.body, 'routes.profiles');
      await profiles.exportTo(req.params.id, body.path);
      res.json({ data: { id: req.params.id, path: body.path } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/profiles/:id/activate
  router.post('/:id/activate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await session.switchProfile(req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/profiles/:id/refresh
  router.post('/:id/refresh', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await session.refreshProfile(req.params.id) });
    } catch (err) {
      next(err);
    }
  });

  // DELETE /api/v1/profiles/:id
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await session.removeProfile(req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
