import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../logger';
import {
  REGION_LABELS,
  fastNodes,
  groupByRegion,
  nodeStatistics,
  regionDistribution,
  sortByDelay,
} from '../services/nodeViews';
import type { NodeRegistry } from '../services/nodeRegistry';

export type NodeService = Pick<
  NodeRegistry,
  | 'snapshot'
  | 'loadNodes'
  | 'selectNode'
  | 'testNodeDelay'
  | 'testAllNodesDelay'
  | 'selectFastestNode'
  | 'selectBestNodeInRegion'
  | 'checkHealth'
>;

export function createNodesRouter(registry: NodeService): Router {
  const router = Router();

  // GET /api/v1/nodes?sort=delay&fast=true
  router.get('/', (req: Request, res: Response) => {
    const snapshot = registry.snapshot();
    let nodes = snapshot.nodes;
    if (req.query.fast === 'true') nodes = fastNodes(nodes);
    if (req.query.sort === 'delay') nodes = sortByDelay(nodes);
    res.json({ data: { ...snapshot, nodes } });
  });

  // GET /api/v1/nodes/regions
  router.get('/regions', (_req: Request, res: Response) => {
    const regions = Object.entries(groupByRegion(registry.snapshot().nodes)).map(([region, members]) => ({
      region,
      label: REGION_LABELS[region] || region,
      count: members.length,
      nodes: sortByDelay(members).map((node) => node.name),
    }));
    res.json({ data: regions });
  });

  // GET /api/v1/nodes/stats
  router.get('/stats', (_req: Request, res: Response) => {
    const { nodes } = registry.snapshot();
    res.json({ data: { ...nodeStatistics(nodes), regions: regionDistribution(nodes) } });
  });

  // POST /api/v1/nodes/reload
  router.post('/reload', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await registry.loadNodes() });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/nodes/delay
  router.post('/delay', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const tested = await registry.testAllNodesDelay();
      res.status(tested ? 200 : 202).json({ data: { tested, nodes: registry.snapshot().nodes } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/nodes/fastest
  router.post('/fastest', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const selected = await registry.selectFastestNode();
      res.json({ data: { selected } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/nodes/health-check
  router.post('/health-check', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const reselected = await registry.checkHealth();
      res.json({ data: { reselected, selectedNode: registry.snapshot().selectedNode } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/nodes/regions/:region/select
  router.post('/regions/:region/select', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const selected = await registry.selectBestNodeInRegion(req.params.region);
      res.json({ data: { region: req.params.region, selected } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/nodes/:name/select
  router.post('/:name/select', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await registry.selectNode(req.params.name);
      res.json({ data: { selected: req.params.name } });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/v1/nodes/:name/delay
  router.post('/:name/delay', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const delay = await registry.testNodeDelay(req.params.name);
      logger.debug({ module: 'routes.nodes', node: req.params.name, delay }, 'Node delay tested');
      res.json({ data: { name: req.params.name, delay } });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
