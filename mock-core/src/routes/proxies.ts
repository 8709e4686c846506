import { Router, Request, Response } from 'express';
import type { Logger } from 'pino';
import type { MockCoreState } from '../state';

export function createProxiesRouter(state: MockCoreState, logger: Logger): Router {
  const router = Router();

  const toInfo = (name: string) => {
    const proxy = state.proxies[name];
    return {
      name,
      type: proxy.type,
      history: proxy.history,
      ...(proxy.all && { all: proxy.all, now: proxy.now }),
    };
  };

  router.get('/', (_req: Request, res: Response) => {
    const proxies: Record<string, ReturnType<typeof toInfo>> = {};
    for (const name of Object.keys(state.proxies)) {
      proxies[name] = toInfo(name);
    }
    res.json({ proxies });
  });

  router.get('/:name', (req: Request, res: Response) => {
    if (!state.proxies[req.params.name]) {
      return res.status(404).json({ message: 'Resource not found' });
    }
    res.json(toInfo(req.params.name));
  });

  router.get('/:name/delay', (req: Request, res: Response) => {
    const name = req.params.name;
    const proxy = state.proxies[name];
    if (!proxy) {
      return res.status(404).json({ message: 'Resource not found' });
    }

    const timeout = parseInt(String(req.query.timeout), 10);
    if (isNaN(timeout) || typeof req.query.url !== 'string') {
      return res.status(400).json({ message: 'Body invalid' });
    }

    const delay = state.delays[name] ?? 'error';
    logger.debug({ module: 'routes.proxies', proxy_name: name, timeout_ms: timeout, outcome: delay }, 'Delay probe');

    if (delay === 'timeout' || (typeof delay === 'number' && delay > timeout)) {
      proxy.history.push({ time: new Date().toISOString(), delay: 0 });
      return res.status(408).json({ message: 'Timeout' });
    }
    if (delay === 'error') {
      proxy.history.push({ time: new Date().toISOString(), delay: 0 });
      return res.status(503).json({ message: 'An error occurred in the delay test' });
    }

    proxy.history.push({ time: new Date().toISOString(), delay });
    res.json({ delay });
  });

  router.put('/:name', (req: Request, res: Response) => {
    const group = state.proxies[req.params.name];
    if (!group) {
      return res.status(404).json({ message: 'Resource not found' });
    }
    const target: unknown = req.body?.name;
    if (!group.all || typeof target !== 'string' || !group.all.includes(target)) {
      return res.status(400).json({ message: 'Selector update error' });
    }

    logger.info({ module: 'routes.proxies', group: req.params.name, old_now: group.now, new_now: target }, 'Selection changed');
    group.now = target;
    res.status(204).end();
  });

  return router;
}
