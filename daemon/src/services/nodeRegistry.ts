import { EventEmitter } from 'events';
import { logger } from '../logger';
import { DecodeError, NodeNotFoundError, NodeNotInAnyGroupError, errorMessage } from '../errors';
import { SerialQueue, mapSettled } from '../utils/async';
import { classifyRegion, isUnhealthy, pickFastest } from './nodeViews';
import type { ControlApi } from '../clients/controlApiClient';
import type { ProxiesResponse, ProxyInfo } from '../clients/schemas';
import type {
  DelayState,
  GroupStrategy,
  NodeSource,
  ProfileConfig,
  ProxyGroup,
  ProxyNode,
  RegistrySnapshot,
} from '../types';

const LIVE_GROUP_TYPES = new Map<string, GroupStrategy>([
  ['Selector', 'select'],
  ['URLTest', 'url-test'],
  ['Fallback', 'fallback'],
  ['LoadBalance', 'load-balance'],
  ['Relay', 'relay'],
]);

// built-in pass-through policies, never listed as nodes
const BUILTIN_TYPES = new Set(['Direct', 'Reject', 'RejectDrop', 'Pass', 'Compatible']);

export interface NodeRegistryOptions {
  delayTest: {
    url: string;
    timeoutMs: number;
    concurrency: number;
  };
  healthCheckIntervalMs: number;
}

export interface NodeRegistryDeps {
  client: Pick<ControlApi, 'getProxies' | 'getProxyDelay' | 'selectProxy'>;
  isCoreRunning: () => boolean;
  loadStaticConfig: () => Promise<ProfileConfig | null>;
}

function seedDelay(info: ProxyInfo): DelayState {
  const history = info.history || [];
  if (history.length === 0) return { status: 'untested' };
  const latest = history[history.length - 1];
  return latest.delay > 0 ? { status: 'ok', ms: latest.delay } : { status: 'failed' };
}

/**
 * Splits the control API's /proxies listing into strategy groups and
 * leaf nodes. The live API does not expose server or port.
 */
export function partitionLiveProxies(response: ProxiesResponse): { nodes: ProxyNode[]; groups: ProxyGroup[] } {
  const nodes: ProxyNode[] = [];
  const groups: ProxyGroup[] = [];

  for (const [name, info] of Object.entries(response.proxies)) {
    const strategy = LIVE_GROUP_TYPES.get(info.type);
    if (strategy) {
      const group: ProxyGroup = { name, type: strategy, members: info.all || [] };
      if (info.now) group.now = info.now;
      groups.push(group);
    } else if (!BUILTIN_TYPES.has(info.type)) {
      nodes.push({ name, type: info.type, server: 'unknown', port: 0, delay: seedDelay(info) });
    }
  }

  return { nodes, groups };
}

/**
 * Holds the known nodes and groups and performs every latency probe and
 * selection against the core. Selections from any path (explicit,
 * fastest, region, health check) run one at a time.
 */
export class NodeRegistry {
  private nodes: ProxyNode[] = [];
  private groups: ProxyGroup[] = [];
  private source: NodeSource = 'empty';
  private selectedNode: string | null = null;
  private delayPass: Promise<void> | null = null;
  private healthTimer: NodeJS.Timeout | null = null;
  private selectionQueue = new SerialQueue();
  private events = new EventEmitter();

  constructor(private deps: NodeRegistryDeps, private options: NodeRegistryOptions) {}

  snapshot(): RegistrySnapshot {
    return {
      source: this.source,
      nodes: this.nodes.map((node) => ({ ...node })),
      groups: this.groups.map((group) => ({ ...group, members: [...group.members] })),
      selectedNode: this.selectedNode,
      testing: this.delayPass !== null,
    };
  }

  onChange(listener: (snapshot: RegistrySnapshot) => void): () => void {
    this.events.on('changed', listener);
    return () => this.events.off('changed', listener);
  }

  async loadNodes(): Promise<RegistrySnapshot> {
    if (this.deps.isCoreRunning()) {
      try {
        const response = await this.deps.client.getProxies();
        this.applyLive(response);
        return this.snapshot();
      } catch (err) {
        if (err instanceof DecodeError) throw err;
        logger.warn({ module: 'services.nodeRegistry', error_detail: errorMessage(err) }, 'Live node load fail, using profile');
      }
    }

    const config = await this.deps.loadStaticConfig();
    this.applyStatic(config);
    return this.snapshot();
  }

  /** Clears everything loaded; used when the active profile changes. */
  clear(): void {
    this.nodes = [];
    this.groups = [];
    this.source = 'empty';
    this.selectedNode = null;
    this.emitChange();
  }

  selectNode(name: string): Promise<void> {
    return this.selectionQueue.run(() => this.applySelection(name));
  }

  /**
   * Probes one node. Any failure, including a timeout, is recorded as a
   * failed measurement and reported as null.
   */
  async testNodeDelay(name: string): Promise<number | null> {
    if (!this.nodes.some((node) => node.name === name)) throw new NodeNotFoundError(name);

    const delay = await this.probe(name);
    this.applyDelays(new Map([[name, delay]]));
    return delay.status === 'ok' ? delay.ms : null;
  }

  /** Probes every known node. Returns false when a pass was already running. */
  async testAllNodesDelay(): Promise<boolean> {
    if (this.delayPass) {
      logger.debug({ module: 'services.nodeRegistry' }, 'Delay test already running, skipped');
      return false;
    }
    await this.startDelayPass();
    return true;
  }

  /** Tests every node, then selects the fastest successful one. Returns its name, or null. */
  selectFastestNode(): Promise<string | null> {
    return this.selectionQueue.run(() => this.selectFastestAfterPass());
  }

  /** Selects the fastest measured node whose name maps to `region`. */
  selectBestNodeInRegion(region: string): Promise<string | null> {
    return this.selectionQueue.run(() =>
      this.selectFastestMeasured(this.nodes.filter((node) => classifyRegion(node.name) === region)),
    );
  }

  /**
   * Re-probes the selected node and switches to the fastest one when it
   * turned unhealthy. Returns true when a new node was selected. Runs on
   * the selection queue, so an explicit selection made meanwhile is
   * applied after it.
   */
  checkHealth(): Promise<boolean> {
    return this.selectionQueue.run(async () => {
      const current = this.selectedNode;
      if (!this.deps.isCoreRunning() || !current || !this.nodes.some((node) => node.name === current)) {
        return false;
      }

      const delay = await this.probe(current);
      this.applyDelays(new Map([[current, delay]]));
      if (!isUnhealthy(delay)) return false;

      logger.warn({ module: 'services.nodeRegistry', node: current, delay }, 'Selected node unhealthy, reselecting');
      const selected = await this.selectFastestAfterPass();
      return selected !== null && selected !== current;
    });
  }

  startHealthCheck(): void {
    if (this.healthTimer) return;
    this.healthTimer = setInterval(() => {
      this.checkHealth().catch((err: unknown) => {
        logger.error({ module: 'services.nodeRegistry', error_detail: errorMessage(err) }, 'Health check fail');
      });
    }, this.options.healthCheckIntervalMs);
    this.healthTimer.unref();
    logger.info({ module: 'services.nodeRegistry', interval_ms: this.options.healthCheckIntervalMs }, 'Health check started');
  }

  stopHealthCheck(): void {
    if (!this.healthTimer) return;
    clearInterval(this.healthTimer);
    this.healthTimer = null;
    logger.info({ module: 'services.nodeRegistry' }, 'Health check stopped');
  }

  private async applySelection(name: string): Promise<void> {
    if (!this.deps.isCoreRunning()) {
      if (!this.nodes.some((node) => node.name === name)) throw new NodeNotFoundError(name);
      this.selectedNode = name;
      logger.info({ module: 'services.nodeRegistry', node: name }, 'Node selected locally');
      this.emitChange();
      return;
    }

    const owners = this.groups.filter((group) => group.members.includes(name));
    const group = owners.find((candidate) => candidate.type === 'select') || owners[0];
    if (!group) throw new NodeNotInAnyGroupError(name);

    await this.deps.client.selectProxy(group.name, name);

    this.groups = this.groups.map((candidate) => (candidate.name === group.name ? { ...candidate, now: name } : candidate));
    this.selectedNode = name;
    logger.info({ module: 'services.nodeRegistry', node: name, group: group.name }, 'Node selected');
    this.emitChange();
  }

  private async selectFastestAfterPass(): Promise<string | null> {
    await (this.delayPass || this.startDelayPass());
    return this.selectFastestMeasured(this.nodes);
  }

  private async selectFastestMeasured(candidates: readonly ProxyNode[]): Promise<string | null> {
    const fastest = pickFastest(candidates);
    if (!fastest) {
      logger.info({ module: 'services.nodeRegistry', candidates: candidates.length }, 'No measured node to select');
      return null;
    }
    await this.applySelection(fastest.name);
    return fastest.name;
  }

  private startDelayPass(): Promise<void> {
    const names = this.nodes.map((node) => node.name);
    const startTime = Date.now();
    logger.info({ module: 'services.nodeRegistry', nodes: names.length }, 'Delay test started');

    const pass = mapSettled(names, this.options.delayTest.concurrency, (name) => this.probe(name))
      .then((results) => {
        const delays = new Map<string, DelayState>();
        results.forEach((result, index) => {
          delays.set(names[index], result.status === 'fulfilled' ? result.value : { status: 'failed' });
        });
        this.delayPass = null;
        this.applyDelays(delays);
        logger.info({
          module: 'services.nodeRegistry',
          nodes: names.length,
          duration_ms: Date.now() - startTime,
        }, 'Delay test finished');
      });

    this.delayPass = pass;
    this.emitChange();
    return pass;
  }

  private async probe(name: string): Promise<DelayState> {
    const { url, timeoutMs } = this.options.delayTest;
    try {
      const response = await this.deps.client.getProxyDelay(name, { timeoutMs, url });
      return { status: 'ok', ms: response.delay };
    } catch (err) {
      logger.debug({ module: 'services.nodeRegistry', node: name, error_detail: errorMessage(err) }, 'Delay probe fail');
      return { status: 'failed' };
    }
  }

  // nodes that disappeared while probes were outstanding are ignored
  private applyDelays(delays: Map<string, DelayState>): void {
    this.nodes = this.nodes.map((node) => {
      const delay = delays.get(node.name);
      return delay ? { ...node, delay } : node;
    });
    this.emitChange();
  }

  private applyLive(response: ProxiesResponse): void {
    const { nodes, groups } = partitionLiveProxies(response);
    const nodeNames = new Set(nodes.map((node) => node.name));
    const selectGroup = groups.find((group) => group.type === 'select' && group.now !== undefined && nodeNames.has(group.now));

    this.nodes = nodes;
    this.groups = groups;
    this.source = 'live';
    this.selectedNode = selectGroup?.now ?? null;
    logger.info({ module: 'services.nodeRegistry', nodes: nodes.length, groups: groups.length }, 'Nodes loaded from core');
    this.emitChange();
  }

  private applyStatic(config: ProfileConfig | null): void {
    if (!config) {
      this.nodes = [];
      this.groups = [];
      this.source = 'empty';
      this.selectedNode = null;
      logger.info({ module: 'services.nodeRegistry' }, 'No active profile, node list empty');
      this.emitChange();
      return;
    }

    // measurements survive a reload from the same profile
    const previous = new Map(this.nodes.map((node): [string, DelayState] => [node.name, node.delay]));
    this.nodes = config.proxies.map((node) => ({ ...node, delay: previous.get(node.name) || node.delay }));
    this.groups = config.proxyGroups.map((group) => ({ ...group, members: [...group.members] }));
    this.source = 'config';
    if (this.selectedNode && !this.nodes.some((node) => node.name === this.selectedNode)) {
      this.selectedNode = null;
    }
    logger.info({
      module: 'services.nodeRegistry',
      nodes: this.nodes.length,
      groups: this.groups.length,
    }, 'Nodes loaded from profile');
    this.emitChange();
  }

  private emitChange(): void {
    this.events.emit('changed', this.snapshot());
  }
}
