export type CoreState = 'stopped' | 'starting' | 'running' | 'stopping';

export type ProxyMode = 'global' | 'rule' | 'direct';

export const PROXY_MODES: readonly ProxyMode[] = ['global', 'rule', 'direct'];

export interface ProcessHandle {
  pid: number | null;
  args: {
    workDir: string;
    configPath: string;
    controlAddress: string;
  };
  logPath: string;
  startedAt: string;
}

export type DelayState =
  | { status: 'untested' }
  | { status: 'ok'; ms: number }
  | { status: 'failed' };

export interface ProxyNode {
  name: string;
  type: string;
  server: string;
  port: number;
  password?: string;
  cipher?: string;
  alpn?: string[];
  skipCertVerify?: boolean;
  delay: DelayState;
}

export type GroupStrategy = 'select' | 'url-test' | 'fallback' | 'load-balance' | 'relay';

export interface ProxyGroup {
  name: string;
  type: GroupStrategy;
  members: string[];
  now?: string;
  url?: string;
  interval?: number;
}

export type NodeSource = 'live' | 'config' | 'empty';

export interface RegistrySnapshot {
  source: NodeSource;
  nodes: ProxyNode[];
  groups: ProxyGroup[];
  selectedNode: string | null;
  testing: boolean;
}

export interface NodeStatistics {
  total: number;
  measured: number;
  failed: number;
  fast: number;
  averageDelay: number;
}

export interface TrafficSample {
  up: number;
  down: number;
  at: number;
}

export interface TrafficRate {
  upload: number;
  download: number;
}

export interface TrafficHistoryPoint {
  time: number;
  upload: number;
  download: number;
}

export interface TrafficSnapshot {
  uploadRate: number;
  downloadRate: number;
  totalUpload: number;
  totalDownload: number;
  history: TrafficHistoryPoint[];
}

export interface Profile {
  id: string;
  name: string;
  subscriptionUrl: string | null;
  lastUpdated: string | null;
  active: boolean;
}

export interface ProfilePorts {
  http: number | null;
  socks: number | null;
  mixed: number | null;
}

export interface ProfileConfig {
  ports: ProfilePorts;
  mode: ProxyMode | null;
  proxies: ProxyNode[];
  proxyGroups: ProxyGroup[];
  rules: string[];
}

export interface Preferences {
  mode: ProxyMode;
  systemProxyEnabled: boolean;
}

export interface SessionSnapshot {
  core: CoreState;
  pid: number | null;
  mode: ProxyMode;
  systemProxy: {
    enabled: boolean;
    applied: boolean;
  };
  activeProfile: Profile | null;
  traffic: TrafficSnapshot;
  nodes: RegistrySnapshot;
}
