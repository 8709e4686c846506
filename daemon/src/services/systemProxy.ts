import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../logger';
import { SystemProxyError, errorMessage } from '../errors';

const execFileAsync = promisify(execFile);

export interface ProxyEndpoint {
  host: string;
  port: number;
}

/** The operating system's network proxy settings. */
export interface SystemProxy {
  apply(enabled: boolean, http: ProxyEndpoint | null, socks: ProxyEndpoint | null): Promise<void>;
  currentlyApplied(): boolean;
  /** Reads the OS settings and reports whether they point at a loopback listener. */
  detect(): Promise<boolean>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface NetworksetupOptions {
  run?: CommandRunner;
  platform?: NodeJS.Platform;
}

async function runCommand(command: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync(command, args);
  return stdout;
}

/**
 * Parses `networksetup -listallnetworkservices`. The first line is a
 * legend and disabled services carry a leading asterisk.
 */
export function parseNetworkServices(output: string): string[] {
  return output
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('*'));
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost']);

/** Parses the `key : value` lines of `scutil --proxy`. */
export function parseProxySettings(output: string): Record<string, string> {
  const settings: Record<string, string> = {};
  for (const line of output.split('\n')) {
    const match = /^\s*([A-Za-z]+)\s*:\s*(\S+)\s*$/.exec(line);
    if (match) settings[match[1]] = match[2];
  }
  return settings;
}

export function pointsAtLoopback(settings: Record<string, string>): boolean {
  return ['HTTP', 'HTTPS', 'SOCKS'].some(
    (kind) => settings[`${kind}Enable`] === '1' && LOOPBACK_HOSTS.has(settings[`${kind}Proxy`] ?? ''),
  );
}

/** macOS system proxy driven through `networksetup`. */
export class NetworksetupSystemProxy implements SystemProxy {
  private applied = false;
  private run: CommandRunner;
  private platform: NodeJS.Platform;

  constructor(options: NetworksetupOptions = {}) {
    this.run = options.run || runCommand;
    this.platform = options.platform || process.platform;
  }

  currentlyApplied(): boolean {
    return this.applied;
  }

  async detect(): Promise<boolean> {
    if (this.platform !== 'darwin') return this.applied;

    try {
      this.applied = pointsAtLoopback(parseProxySettings(await this.run('scutil', ['--proxy'])));
    } catch (err) {
      logger.warn({ module: 'services.systemProxy', error_detail: errorMessage(err) }, 'System proxy state unreadable');
    }
    return this.applied;
  }

  async apply(enabled: boolean, http: ProxyEndpoint | null, socks: ProxyEndpoint | null): Promise<void> {
    if (this.platform !== 'darwin') {
      throw new SystemProxyError(`System proxy is not supported on ${this.platform}`);
    }

    try {
      const services = parseNetworkServices(await this.run('networksetup', ['-listallnetworkservices']));
      for (const service of services) {
        if (enabled) {
          await this.enableFor(service, http, socks);
        } else {
          await this.disableFor(service);
        }
      }
      this.applied = enabled;
      logger.info({
        module: 'services.systemProxy',
        enabled,
        services: services.length,
        http: http ? `${http.host}:${http.port}` : null,
        socks: socks ? `${socks.host}:${socks.port}` : null,
      }, 'System proxy updated');
    } catch (err) {
      logger.error({ module: 'services.systemProxy', enabled, error_detail: errorMessage(err) }, 'System proxy update fail');
      throw new SystemProxyError(`Failed to ${enabled ? 'apply' : 'revert'} system proxy: ${errorMessage(err)}`);
    }
  }

  private async enableFor(service: string, http: ProxyEndpoint | null, socks: ProxyEndpoint | null): Promise<void> {
    if (http) {
      await this.run('networksetup', ['-setwebproxy', service, http.host, String(http.port)]);
      await this.run('networksetup', ['-setsecurewebproxy', service, http.host, String(http.port)]);
    }
    if (socks) {
      await this.run('networksetup', ['-setsocksfirewallproxy', service, socks.host, String(socks.port)]);
    }
  }

  private async disableFor(service: string): Promise<void> {
    await this.run('networksetup', ['-setwebproxystate', service, 'off']);
    await this.run('networksetup', ['-setsecurewebproxystate', service, 'off']);
    await this.run('networksetup', ['-setsocksfirewallproxystate', service, 'off']);
  }
}
