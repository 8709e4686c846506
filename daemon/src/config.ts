import os from 'os';
import path from 'path';

export interface DaemonConfig {
  port: number;
  corsOrigin: string;
  home: string;
  configsDir: string;
  logsDir: string;
  coreBinary: string;
  controlApi: {
    host: string;
    port: number;
    secret: string;
    timeoutMs: number;
  };
  core: {
    readyTimeoutMs: number;
    readyPollMs: number;
    restartSettleMs: number;
    stopGraceMs: number;
  };
  traffic: {
    intervalMs: number;
  };
  delayTest: {
    url: string;
    timeoutMs: number;
    concurrency: number;
  };
  healthCheck: {
    enabled: boolean;
    intervalMs: number;
  };
  subscriptionTimeoutMs: number;
}

function intFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const parsed = parseInt(env[key] || '', 10);
  return isNaN(parsed) ? fallback : parsed;
}

function boolFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DaemonConfig {
  const home = env.COREBAR_HOME || path.join(os.homedir(), '.corebar');

  return {
    port: intFromEnv(env, 'PORT', 8720),
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:5173',
    home,
    configsDir: path.join(home, 'configs'),
    logsDir: path.join(home, 'logs'),
    coreBinary: env.CORE_BINARY || path.join(home, 'bin', 'clash'),
    controlApi: {
      host: env.CONTROL_API_HOST || '127.0.0.1',
      port: intFromEnv(env, 'CONTROL_API_PORT', 9090),
      secret: env.CONTROL_API_SECRET || '',
      timeoutMs: intFromEnv(env, 'CONTROL_API_TIMEOUT_MS', 5000),
    },
    core: {
      readyTimeoutMs: intFromEnv(env, 'CORE_READY_TIMEOUT_MS', 10000),
      readyPollMs: intFromEnv(env, 'CORE_READY_POLL_MS', 500),
      restartSettleMs: intFromEnv(env, 'CORE_RESTART_SETTLE_MS', 1000),
      stopGraceMs: intFromEnv(env, 'CORE_STOP_GRACE_MS', 5000),
    },
    traffic: {
      intervalMs: intFromEnv(env, 'TRAFFIC_INTERVAL_MS', 1000),
    },
    delayTest: {
      url: env.DELAY_TEST_URL || 'http://www.gstatic.com/generate_204',
      timeoutMs: intFromEnv(env, 'DELAY_TEST_TIMEOUT_MS', 5000),
      concurrency: Math.max(1, intFromEnv(env, 'DELAY_TEST_CONCURRENCY', 8)),
    },
    healthCheck: {
      enabled: boolFromEnv(env, 'HEALTH_CHECK_ENABLED', true),
      intervalMs: intFromEnv(env, 'HEALTH_CHECK_INTERVAL_MS', 300000),
    },
    subscriptionTimeoutMs: intFromEnv(env, 'SUBSCRIPTION_TIMEOUT_MS', 30000),
  };
}
