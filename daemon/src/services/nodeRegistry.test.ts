import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NodeRegistry, partitionLiveProxies } from './nodeRegistry';
import type { NodeRegistryOptions } from './nodeRegistry';
import { ApiError, DecodeError, NodeNotFoundError, NodeNotInAnyGroupError, TransportError } from '../errors';
import type { DelayProbeOptions } from '../clients/controlApiClient';
import type { DelayResponse, ProxiesResponse } from '../clients/schemas';
import type { ProfileConfig } from '../types';

const OPTIONS: NodeRegistryOptions = {
  delayTest: { url: 'http://www.gstatic.com/generate_204', timeoutMs: 5000, concurrency: 8 },
  healthCheckIntervalMs: 1000,
};

function liveProxies(): ProxiesResponse {
  return {
    proxies: {
      DIRECT: { type: 'Direct', history: [] },
      REJECT: { type: 'Reject', history: [] },
      A: { type: 'Shadowsocks', history: [{ time: '2026-01-01T00:00:00Z', delay: 120 }] },
      B: { type: 'Trojan', history: [{ time: '2026-01-01T00:00:00Z', delay: 0 }] },
      C: { type: 'Vmess', history: [] },
      Orphan: { type: 'Vmess', history: [] },
      Proxy: { type: 'Selector', now: 'C', all: ['A', 'B', 'C', 'DIRECT'], history: [] },
      Auto: { type: 'URLTest', now: 'A', all: ['A', 'B', 'C'], history: [] },
      GLOBAL: { type: 'Selector', now: 'Proxy', all: ['Proxy', 'Auto', 'DIRECT'], history: [] },
    },
  };
}

const STATIC_CONFIG: ProfileConfig = {
  ports: { http: 7890, socks: 7891, mixed: null },
  mode: 'rule',
  proxies: [
    { name: 'HK-Premium-01', type: 'ss', server: 'hk.example.com', port: 8388, delay: { status: 'untested' } },
    { name: 'JP-Tokyo-02', type: 'trojan', server: 'jp.example.com', port: 443, delay: { status: 'untested' } },
  ],
  proxyGroups: [{ name: 'Proxy', type: 'select', members: ['HK-Premium-01', 'JP-Tokyo-02'] }],
  rules: ['MATCH,Proxy'],
};

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('partitionLiveProxies', () => {
  it('separates groups from nodes and drops built-in policies', () => {
    const { nodes, groups } = partitionLiveProxies(liveProxies());

    expect(nodes).toEqual([
      { name: 'A', type: 'Shadowsocks', server: 'unknown', port: 0, delay: { status: 'ok', ms: 120 } },
      { name: 'B', type: 'Trojan', server: 'unknown', port: 0, delay: { status: 'failed' } },
      { name: 'C', type: 'Vmess', server: 'unknown', port: 0, delay: { status: 'untested' } },
      { name: 'Orphan', type: 'Vmess', server: 'unknown', port: 0, delay: { status: 'untested' } },
    ]);
    expect(groups.map((group) => [group.name, group.type, group.now])).toEqual([
      ['Proxy', 'select', 'C'],
      ['Auto', 'url-test', 'A'],
      ['GLOBAL', 'select', 'Proxy'],
    ]);
  });
});

describe('NodeRegistry', () => {
  let running: boolean;
  let staticConfig: ProfileConfig | null;
  let delays: Record<string, number | 'timeout'>;

  const probeFromTable = async (name: string, _probe: DelayProbeOptions): Promise<DelayResponse> => {
    const delay = delays[name];
    if (delay === undefined || delay === 'timeout') throw new ApiError(408, `/proxies/${name}/delay`);
    return { delay };
  };
  const getProxies = vi.fn(async (): Promise<ProxiesResponse> => liveProxies());
  const getProxyDelay = vi.fn(probeFromTable);
  const selectProxy = vi.fn(async (_group: string, _name: string) => undefined);

  function createRegistry(options: NodeRegistryOptions = OPTIONS): NodeRegistry {
    return new NodeRegistry({
      client: { getProxies, getProxyDelay, selectProxy },
      isCoreRunning: () => running,
      loadStaticConfig: async () => staticConfig,
    }, options);
  }

  beforeEach(() => {
    running = true;
    staticConfig = STATIC_CONFIG;
    delays = { A: 120, B: 'timeout', C: 980, Orphan: 'timeout' };
    getProxies.mockReset();
    getProxies.mockImplementation(async () => liveProxies());
    getProxyDelay.mockReset();
    getProxyDelay.mockImplementation(probeFromTable);
    selectProxy.mockReset();
    selectProxy.mockResolvedValue(undefined);
  });

  describe('loadNodes', () => {
    it('loads live data while the core runs', async () => {
      const snapshot = await createRegistry().loadNodes();

      expect(snapshot.source).toBe('live');
      expect(snapshot.nodes.map((node) => node.name)).toEqual(['A', 'B', 'C', 'Orphan']);
      expect(snapshot.selectedNode).toBe('C');
    });

    it('loads the active profile while the core is stopped', async () => {
      running = false;
      const snapshot = await createRegistry().loadNodes();

      expect(getProxies).not.toHaveBeenCalled();
      expect(snapshot.source).toBe('config');
      expect(snapshot.nodes[0]).toMatchObject({ name: 'HK-Premium-01', server: 'hk.example.com', port: 8388 });
      expect(snapshot.selectedNode).toBeNull();
    });

    it('falls back to the profile when the core is unreachable', async () => {
      getProxies.mockRejectedValueOnce(new TransportError('/proxies', 'Control API unreachable: ECONNREFUSED'));
      const snapshot = await createRegistry().loadNodes();

      expect(snapshot.source).toBe('config');
      expect(snapshot.nodes).toHaveLength(2);
    });

    it('propagates an undecodable listing', async () => {
      getProxies.mockRejectedValueOnce(new DecodeError('/proxies', 'proxies: Required'));
      await expect(createRegistry().loadNodes()).rejects.toBeInstanceOf(DecodeError);
    });

    it('reports an empty registry without an active profile', async () => {
      running = false;
      staticConfig = null;
      const snapshot = await createRegistry().loadNodes();

      expect(snapshot).toEqual({ source: 'empty', nodes: [], groups: [], selectedNode: null, testing: false });
    });
  });

  describe('selectNode', () => {
    it('puts the selection to the owning select group', async () => {
      const registry = createRegistry();
      await registry.loadNodes();

      await registry.selectNode('A');

      expect(selectProxy).toHaveBeenCalledWith('Proxy', 'A');
      const snapshot = registry.snapshot();
      expect(snapshot.selectedNode).toBe('A');
      expect(snapshot.groups.find((group) => group.name === 'Proxy')?.now).toBe('A');
    });

    it('fails for a node no group contains and keeps the previous selection', async () => {
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.selectNode('Orphan')).rejects.toBeInstanceOf(NodeNotInAnyGroupError);

      expect(selectProxy).not.toHaveBeenCalled();
      expect(registry.snapshot().selectedNode).toBe('C');
    });

    it('keeps the previous selection when the core rejects it', async () => {
      selectProxy.mockRejectedValueOnce(new ApiError(400, '/proxies/Proxy'));
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.selectNode('A')).rejects.toBeInstanceOf(ApiError);
      expect(registry.snapshot().selectedNode).toBe('C');
    });

    it('selects locally while the core is stopped', async () => {
      running = false;
      const registry = createRegistry();
      await registry.loadNodes();

      await registry.selectNode('JP-Tokyo-02');
      await expect(registry.selectNode('Nowhere')).rejects.toBeInstanceOf(NodeNotFoundError);

      expect(selectProxy).not.toHaveBeenCalled();
      expect(registry.snapshot().selectedNode).toBe('JP-Tokyo-02');
    });

    it('runs selections one at a time', async () => {
      const pending = deferred<undefined>();
      selectProxy.mockImplementationOnce(() => pending.promise);
      const registry = createRegistry();
      await registry.loadNodes();

      const first = registry.selectNode('A');
      const second = registry.selectNode('B');
      await vi.waitFor(() => expect(selectProxy).toHaveBeenCalledTimes(1));
      await new Promise((resolve) => setImmediate(resolve));
      expect(selectProxy).toHaveBeenCalledTimes(1);

      pending.resolve(undefined);
      await Promise.all([first, second]);
      expect(selectProxy.mock.calls).toEqual([['Proxy', 'A'], ['Proxy', 'B']]);
      expect(registry.snapshot().selectedNode).toBe('B');
    });
  });

  describe('latency testing', () => {
    it('records one probe and reports failures as null', async () => {
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.testNodeDelay('C')).resolves.toBe(980);
      await expect(registry.testNodeDelay('B')).resolves.toBeNull();
      await expect(registry.testNodeDelay('Nowhere')).rejects.toBeInstanceOf(NodeNotFoundError);

      expect(getProxyDelay).toHaveBeenCalledWith('C', { timeoutMs: 5000, url: 'http://www.gstatic.com/generate_204' });
      const nodes = registry.snapshot().nodes;
      expect(nodes.find((node) => node.name === 'C')?.delay).toEqual({ status: 'ok', ms: 980 });
      expect(nodes.find((node) => node.name === 'B')?.delay).toEqual({ status: 'failed' });
    });

    it('probes every node and keeps each outcome', async () => {
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.testAllNodesDelay()).resolves.toBe(true);

      expect(registry.snapshot().nodes.map((node) => [node.name, node.delay])).toEqual([
        ['A', { status: 'ok', ms: 120 }],
        ['B', { status: 'failed' }],
        ['C', { status: 'ok', ms: 980 }],
        ['Orphan', { status: 'failed' }],
      ]);
    });

    it('applies results only after the whole batch finishes', async () => {
      const slow = deferred<DelayResponse>();
      getProxyDelay.mockImplementation(async (name: string) => (name === 'C' ? slow.promise : { delay: 50 }));
      const registry = createRegistry();
      await registry.loadNodes();

      const pass = registry.testAllNodesDelay();
      await vi.waitFor(() => expect(getProxyDelay).toHaveBeenCalledTimes(4));
      await new Promise((resolve) => setImmediate(resolve));
      expect(registry.snapshot().nodes.find((node) => node.name === 'B')?.delay).toEqual({ status: 'failed' });
      expect(registry.snapshot().testing).toBe(true);

      slow.resolve({ delay: 75 });
      await pass;
      expect(registry.snapshot().nodes.find((node) => node.name === 'B')?.delay).toEqual({ status: 'ok', ms: 50 });
      expect(registry.snapshot().testing).toBe(false);
    });

    it('skips a second pass while one is running', async () => {
      const slow = deferred<DelayResponse>();
      getProxyDelay.mockImplementation(() => slow.promise);
      const registry = createRegistry();
      await registry.loadNodes();

      const pass = registry.testAllNodesDelay();
      await expect(registry.testAllNodesDelay()).resolves.toBe(false);

      slow.resolve({ delay: 10 });
      await expect(pass).resolves.toBe(true);
      expect(getProxyDelay).toHaveBeenCalledTimes(4);
    });

    it('keeps at most the configured number of probes in flight', async () => {
      let inFlight = 0;
      let peak = 0;
      getProxyDelay.mockImplementation(async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return { delay: 10 };
      });
      const registry = createRegistry({ ...OPTIONS, delayTest: { ...OPTIONS.delayTest, concurrency: 2 } });
      await registry.loadNodes();

      await registry.testAllNodesDelay();

      expect(getProxyDelay).toHaveBeenCalledTimes(4);
      expect(peak).toBe(2);
    });
  });

  describe('fastest selection', () => {
    it('tests every node and selects the fastest success', async () => {
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.selectFastestNode()).resolves.toBe('A');

      expect(selectProxy).toHaveBeenCalledWith('Proxy', 'A');
      expect(registry.snapshot().selectedNode).toBe('A');
    });

    it('leaves the selection alone when every probe failed', async () => {
      delays = {};
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.selectFastestNode()).resolves.toBeNull();
      expect(selectProxy).not.toHaveBeenCalled();
      expect(registry.snapshot().selectedNode).toBe('C');
    });

    it('selects the fastest measured node of a region', async () => {
      getProxies.mockResolvedValueOnce({
        proxies: {
          'HK-A': { type: 'Shadowsocks', history: [{ time: '2026-01-01T00:00:00Z', delay: 200 }] },
          'HK-B': { type: 'Shadowsocks', history: [{ time: '2026-01-01T00:00:00Z', delay: 90 }] },
          'JP-C': { type: 'Trojan', history: [{ time: '2026-01-01T00:00:00Z', delay: 50 }] },
          Proxy: { type: 'Selector', now: 'HK-A', all: ['HK-A', 'HK-B', 'JP-C'], history: [] },
        },
      });
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.selectBestNodeInRegion('hk')).resolves.toBe('HK-B');
      await expect(registry.selectBestNodeInRegion('us')).resolves.toBeNull();
      expect(selectProxy.mock.calls).toEqual([['Proxy', 'HK-B']]);
    });
  });

  describe('health check', () => {
    it('reselects when the selected node turned unhealthy', async () => {
      delays.C = 1500;
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.checkHealth()).resolves.toBe(true);
      expect(registry.snapshot().selectedNode).toBe('A');
    });

    it('leaves a healthy selection alone', async () => {
      delays.C = 200;
      const registry = createRegistry();
      await registry.loadNodes();

      await expect(registry.checkHealth()).resolves.toBe(false);
      expect(getProxyDelay).toHaveBeenCalledTimes(1);
      expect(selectProxy).not.toHaveBeenCalled();
    });

    it('does nothing while the core is stopped', async () => {
      const registry = createRegistry();
      await registry.loadNodes();
      running = false;

      await expect(registry.checkHealth()).resolves.toBe(false);
      expect(getProxyDelay).not.toHaveBeenCalled();
    });

    it('applies an explicit selection made during the check after it', async () => {
      const held = deferred<DelayResponse>();
      getProxyDelay.mockImplementationOnce(() => held.promise);
      const registry = createRegistry();
      await registry.loadNodes();

      const check = registry.checkHealth();
      await vi.waitFor(() => expect(getProxyDelay).toHaveBeenCalledTimes(1));
      const choice = registry.selectNode('B');
      held.resolve({ delay: 1500 });

      await expect(check).resolves.toBe(true);
      await choice;
      expect(selectProxy.mock.calls).toEqual([['Proxy', 'A'], ['Proxy', 'B']]);
      expect(registry.snapshot().selectedNode).toBe('B');
    });

    it('runs on its interval until stopped', async () => {
      vi.useFakeTimers();
      try {
        delays.C = 200;
        const registry = createRegistry();
        await registry.loadNodes();

        registry.startHealthCheck();
        await vi.advanceTimersByTimeAsync(1000);
        expect(getProxyDelay).toHaveBeenCalledTimes(1);

        registry.stopHealthCheck();
        await vi.advanceTimersByTimeAsync(3000);
        expect(getProxyDelay).toHaveBeenCalledTimes(1);
      } finally {
        vi.useRealTimers();
      }
    });
  });

  it('notifies listeners with a fresh snapshot on change', async () => {
    const registry = createRegistry();
    const listener = vi.fn();
    registry.onChange(listener);

    await registry.loadNodes();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({ source: 'live', selectedNode: 'C' });
  });
});
