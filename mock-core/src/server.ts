import { createDemoState } from './state';
import { logger, startMockCore } from './mockCore';

// Accepts the proxy core's launch flags so it can stand in for the real binary
function parseArgs(argv: string[]): { workDir: string | null; configPath: string | null; host: string; port: number } {
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    if (argv[i].startsWith('-') && i + 1 < argv.length) {
      flags.set(argv[i].replace(/^-+/, ''), argv[i + 1]);
      i++;
    }
  }

  const [host, portText] = (flags.get('ext-ctl') || '127.0.0.1:9090').split(':');
  const port = parseInt(portText, 10);

  return {
    workDir: flags.get('d') || null,
    configPath: flags.get('f') || null,
    host: host || '127.0.0.1',
    port: isNaN(port) ? 9090 : port,
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const state = createDemoState();
  state.secret = process.env.MOCK_CORE_SECRET || '';

  const core = await startMockCore({ host: args.host, port: args.port, state });

  logger.info({
    module: 'server',
    work_dir: args.workDir,
    config_path: args.configPath,
    controller: `${core.host}:${core.port}`,
  }, 'Mock core started');

  // Counters grow like a live core's would
  const trafficTimer = setInterval(() => {
    state.traffic.up += Math.floor(Math.random() * 20000);
    state.traffic.down += Math.floor(Math.random() * 120000);
  }, 1000);

  const shutdown = () => {
    logger.info({ module: 'server' }, 'Shutting down...');
    clearInterval(trafficTimer);
    core.close().then(
      () => process.exit(0),
      (err: Error) => {
        logger.error({ module: 'server', error_detail: err.message }, 'Shutdown fail');
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: Error) => {
  logger.fatal({ module: 'server', error_detail: err.message }, 'Mock core failed to start');
  process.exit(1);
});
