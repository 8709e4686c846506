export interface MockDelayHistory {
  time: string;
  delay: number;
}

export interface MockProxy {
  type: string;
  now?: string;
  all?: string[];
  history: MockDelayHistory[];
}

// a number answers with that delay; 'timeout' answers 408, 'error' answers 503
export type MockDelay = number | 'timeout' | 'error';

export interface MockRequestRecord {
  method: string;
  path: string;
  body: unknown;
}

export interface MockCoreState {
  secret: string;
  mode: string;
  ports: {
    port: number;
    socksPort: number;
    mixedPort: number;
  };
  traffic: {
    up: number;
    down: number;
  };
  proxies: Record<string, MockProxy>;
  delays: Record<string, MockDelay>;
  requests: MockRequestRecord[];
}

export function createState(overrides: Partial<MockCoreState> = {}): MockCoreState {
  return {
    secret: '',
    mode: 'rule',
    ports: { port: 7890, socksPort: 7891, mixedPort: 0 },
    traffic: { up: 0, down: 0 },
    proxies: {
      DIRECT: { type: 'Direct', history: [] },
      REJECT: { type: 'Reject', history: [] },
    },
    delays: {},
    requests: [],
    ...overrides,
  };
}

export function addNode(state: MockCoreState, name: string, type = 'Shadowsocks', delay?: MockDelay): void {
  state.proxies[name] = { type, history: [] };
  if (delay !== undefined) {
    state.delays[name] = delay;
  }
}

function addGroup(state: MockCoreState, name: string, members: string[], type = 'Selector'): void {
  state.proxies[name] = { type, now: members[0], all: [...members], history: [] };
}

export function createDemoState(): MockCoreState {
  const state = createState();
  addNode(state, 'HK-Premium-01', 'Shadowsocks', 86);
  addNode(state, 'JP-Tokyo-02', 'Trojan', 142);
  addNode(state, 'US-West-03', 'Vmess', 231);
  addNode(state, 'SG-Relay-04', 'Trojan', 'timeout');
  addGroup(state, 'Proxy', ['HK-Premium-01', 'JP-Tokyo-02', 'US-West-03', 'SG-Relay-04', 'DIRECT']);
  addGroup(state, 'Auto', ['HK-Premium-01', 'JP-Tokyo-02', 'US-West-03'], 'URLTest');
  addGroup(state, 'GLOBAL', ['Proxy', 'Auto', 'DIRECT', 'REJECT']);
  return state;
}
