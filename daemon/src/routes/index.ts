import { Router } from 'express';
import { createNodesRouter } from './nodes';
import { createProfilesRouter } from './profiles';
import { createSessionRouter, createTrafficRouter } from './session';
import type { NodeService } from './nodes';
import type { ProfileRouterDeps } from './profiles';
import type { SessionService } from './session';

export interface ApiDeps {
  session: SessionService & ProfileRouterDeps['session'];
  registry: NodeService;
  profiles: ProfileRouterDeps['profiles'];
}

export function createApiRouter(deps: ApiDeps): Router {
  const apiRouter = Router();

  apiRouter.use('/session', createSessionRouter(deps.session));
  apiRouter.use('/traffic', createTrafficRouter(deps.session));
  apiRouter.use('/nodes', createNodesRouter(deps.registry));
  apiRouter.use('/profiles', createProfilesRouter({ profiles: deps.profiles, session: deps.session }));

  return apiRouter;
}
