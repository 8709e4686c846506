import { loadConfig } from './config';
import { logger } from './logger';
import { createApp } from './app';
import { ControlApiClient } from './clients/controlApiClient';
import { ProcessSupervisor } from './core/processSupervisor';
import { readProfileConfig } from './services/configReader';
import { NodeRegistry } from './services/nodeRegistry';
import { ProfileStore } from './services/profileStore';
import { SessionOrchestrator } from './services/sessionOrchestrator';
import { SettingsStore } from './services/settingsStore';
import { NetworksetupSystemProxy } from './services/systemProxy';
import { TrafficSampler } from './services/trafficSampler';
import { attachEventStream } from './ws/events';
import { errorMessage } from './errors';

async function main() {
  const config = loadConfig();

  const client = new ControlApiClient({
    host: config.controlApi.host,
    port: config.controlApi.port,
    secret: config.controlApi.secret,
    timeoutMs: config.controlApi.timeoutMs,
  });

  const supervisor = new ProcessSupervisor(client, {
    binaryPath: config.coreBinary,
    workDir: config.home,
    logsDir: config.logsDir,
    controlAddress: client.address,
    ...config.core,
  });

  const profiles = new ProfileStore({
    home: config.home,
    configsDir: config.configsDir,
    subscriptionTimeoutMs: config.subscriptionTimeoutMs,
  });

  const registry = new NodeRegistry({
    client,
    isCoreRunning: () => supervisor.isRunning(),
    loadStaticConfig: async () => {
      const configPath = await profiles.activePath();
      return configPath ? readProfileConfig(configPath) : null;
    },
  }, {
    delayTest: config.delayTest,
    healthCheckIntervalMs: config.healthCheck.intervalMs,
  });

  const session = new SessionOrchestrator({
    supervisor,
    sampler: new TrafficSampler(client, { intervalMs: config.traffic.intervalMs }),
    registry,
    profiles,
    settings: new SettingsStore(config.home),
    systemProxy: new NetworksetupSystemProxy(),
    client,
    healthCheckEnabled: config.healthCheck.enabled,
  });

  await session.init();

  const app = createApp({ session, registry, profiles }, { corsOrigin: config.corsOrigin });

  const server = app.listen(config.port, () => {
    logger.info({
      module: 'index',
      port: config.port,
      home: config.home,
      core_binary: config.coreBinary,
      controller: client.address,
      node_version: process.version,
    }, 'Daemon started');
  });
  const detachEvents = attachEventStream(server, session);

  const shutdown = async (signal: string) => {
    logger.info({ module: 'index', signal }, 'Shutdown requested');
    const result = await session.shutdown();
    await detachEvents();
    await supervisor.whenStopped();
    server.close(() => {
      logger.info({ module: 'index', core_stop_ok: result.ok }, 'Daemon stopped');
      process.exit(0);
    });
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.fatal({ module: 'index', error_detail: errorMessage(err) }, 'Shutdown fail');
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.fatal({ module: 'index', error_detail: errorMessage(err) }, 'Daemon failed to start');
  process.exit(1);
});
