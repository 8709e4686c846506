import { EventEmitter } from 'events';
import { logger } from '../logger';
import { ConfigNotFoundError, errorMessage } from '../errors';
import { readProfileConfig } from './configReader';
import type { ControlApi } from '../clients/controlApiClient';
import type { ProcessSupervisor } from '../core/processSupervisor';
import type { NodeRegistry } from './nodeRegistry';
import type { ProfileStore } from './profileStore';
import type { SettingsStore } from './settingsStore';
import type { ProxyEndpoint, SystemProxy } from './systemProxy';
import type { TrafficSampler } from './trafficSampler';
import type { Preferences, Profile, ProfilePorts, ProxyMode, SessionSnapshot } from '../types';

const LOOPBACK = '127.0.0.1';
const DEFAULT_HTTP_PORT = 7890;
const DEFAULT_SOCKS_PORT = 7891;

export type StartResult =
  | { status: 'started' }
  | { status: 'partial'; systemProxyError: string };

export interface StopResult {
  ok: boolean;
  coreError?: string;
  systemProxyError?: string;
}

export type ToggleResult =
  | { action: 'start'; result: StartResult }
  | { action: 'stop'; result: StopResult };

export interface SessionDeps {
  supervisor: Pick<
    ProcessSupervisor,
    'getState' | 'getHandle' | 'start' | 'stop' | 'restart' | 'onStateChange' | 'onUnexpectedExit'
  >;
  sampler: Pick<TrafficSampler, 'start' | 'stop' | 'snapshot' | 'onSample'>;
  registry: Pick<NodeRegistry, 'loadNodes' | 'clear' | 'snapshot' | 'onChange' | 'startHealthCheck' | 'stopHealthCheck'>;
  profiles: Pick<
    ProfileStore,
    'active' | 'activePath' | 'activate' | 'add' | 'importFile' | 'refresh' | 'remove' | 'ensureDefault'
  >;
  settings: Pick<SettingsStore, 'load' | 'update'>;
  systemProxy: SystemProxy;
  client: Pick<ControlApi, 'patchConfigs' | 'getConfigs'>;
  healthCheckEnabled: boolean;
}

/** Local listener endpoints the system proxy should point at. A mixed port serves both. */
export function proxyEndpoints(ports: ProfilePorts | null): { http: ProxyEndpoint; socks: ProxyEndpoint } {
  const mixed = ports?.mixed && ports.mixed > 0 ? ports.mixed : null;
  const http = mixed ?? (ports?.http && ports.http > 0 ? ports.http : DEFAULT_HTTP_PORT);
  const socks = mixed ?? (ports?.socks && ports.socks > 0 ? ports.socks : DEFAULT_SOCKS_PORT);
  return {
    http: { host: LOOPBACK, port: http },
    socks: { host: LOOPBACK, port: socks },
  };
}

/**
 * The session the UI binds to: core lifecycle, traffic sampling, node
 * registry, routing mode and the system proxy overlay.
 */
export class SessionOrchestrator {
  private preferences: Preferences = { mode: 'rule', systemProxyEnabled: false };
  private activeProfile: Profile | null = null;
  private events = new EventEmitter();

  constructor(private deps: SessionDeps) {
    deps.supervisor.onStateChange((state) => {
      if (state === 'running') {
        deps.sampler.start();
        if (deps.healthCheckEnabled) deps.registry.startHealthCheck();
      } else {
        deps.sampler.stop();
        deps.registry.stopHealthCheck();
      }
      this.emitChange();
    });
    deps.supervisor.onUnexpectedExit(() => {
      this.handleUnexpectedExit().catch((err: unknown) => {
        logger.error({ module: 'services.session', error_detail: errorMessage(err) }, 'Unexpected exit cleanup fail');
      });
    });
    deps.sampler.onSample(() => this.emitChange());
    deps.registry.onChange(() => this.emitChange());
  }

  /** Loads preferences and the active profile, and shows the profile's nodes. */
  async init(): Promise<void> {
    this.preferences = await this.deps.settings.load();
    await this.deps.profiles.ensureDefault();
    this.activeProfile = await this.deps.profiles.active();
    await this.deps.registry.loadNodes();
    const leftApplied = await this.deps.systemProxy.detect();
    logger.info({
      module: 'services.session',
      mode: this.preferences.mode,
      system_proxy: this.preferences.systemProxyEnabled,
      system_proxy_applied: leftApplied,
      profile_id: this.activeProfile?.id ?? null,
    }, 'Session initialized');
  }

  snapshot(): SessionSnapshot {
    const handle = this.deps.supervisor.getHandle();
    return {
      core: this.deps.supervisor.getState(),
      pid: handle ? handle.pid : null,
      mode: this.preferences.mode,
      systemProxy: {
        enabled: this.preferences.systemProxyEnabled,
        applied: this.deps.systemProxy.currentlyApplied(),
      },
      activeProfile: this.activeProfile ? { ...this.activeProfile } : null,
      traffic: this.deps.sampler.snapshot(),
      nodes: this.deps.registry.snapshot(),
    };
  }

  onChange(listener: (snapshot: SessionSnapshot) => void): () => void {
    this.events.on('changed', listener);
    return () => this.events.off('changed', listener);
  }

  async toggleProxy(): Promise<ToggleResult> {
    if (this.deps.supervisor.getState() === 'stopped') {
      return { action: 'start', result: await this.startProxy() };
    }
    return { action: 'stop', result: await this.stopProxy() };
  }

  /**
   * Starts the core with the active profile. Mode alignment and node
   * loading are best effort; a system proxy failure leaves the core
   * running and is reported as a partial start.
   */
  async startProxy(): Promise<StartResult> {
    const configPath = await this.requireConfigPath();
    await this.deps.supervisor.start(configPath);
    logger.info({ module: 'services.session', config_path: configPath }, 'Proxy started');
    await this.afterCoreStarted();
    return this.applySystemProxyPreference(configPath);
  }

  /** Stops the core and reverts the system proxy; each step is attempted regardless of the other. */
  async stopProxy(): Promise<StopResult> {
    const result: StopResult = { ok: true };

    if (this.deps.supervisor.getState() !== 'stopped') {
      try {
        await this.deps.supervisor.stop();
      } catch (err) {
        result.ok = false;
        result.coreError = errorMessage(err);
      }
    }

    if (this.deps.systemProxy.currentlyApplied()) {
      try {
        await this.revertSystemProxy();
      } catch (err) {
        result.ok = false;
        result.systemProxyError = errorMessage(err);
      }
    }

    logger.info({
      module: 'services.session',
      ok: result.ok,
      core_error: result.coreError,
      system_proxy_error: result.systemProxyError,
    }, 'Proxy stopped');
    this.emitChange();
    return result;
  }

  /** Restarts the core; when it does not come back the system proxy is reverted before the error surfaces. */
  async restartProxy(): Promise<StartResult> {
    const configPath = await this.requireConfigPath();
    try {
      await this.deps.supervisor.restart(configPath);
    } catch (err) {
      logger.error({ module: 'services.session', config_path: configPath, error_detail: errorMessage(err) }, 'Proxy restart fail');
      if (this.deps.systemProxy.currentlyApplied()) {
        try {
          await this.revertSystemProxy();
        } catch (revertErr) {
          logger.error({ module: 'services.session', error_detail: errorMessage(revertErr) }, 'System proxy revert after restart fail');
        }
      }
      this.emitChange();
      throw err;
    }
    logger.info({ module: 'services.session', config_path: configPath }, 'Proxy restarted');
    await this.afterCoreStarted();
    return this.applySystemProxyPreference(configPath);
  }

  /** Changes the routing mode; while running the core must accept it first. */
  async setMode(mode: ProxyMode): Promise<void> {
    if (this.deps.supervisor.getState() === 'running') {
      await this.deps.client.patchConfigs({ mode });
    }
    this.preferences = await this.deps.settings.update({ mode });
    logger.info({ module: 'services.session', mode }, 'Mode changed');
    this.emitChange();
  }

  async setSystemProxy(enabled: boolean): Promise<void> {
    if (this.deps.supervisor.getState() === 'running') {
      if (enabled) {
        await this.applySystemProxy(await this.requireConfigPath());
      } else if (this.deps.systemProxy.currentlyApplied()) {
        await this.revertSystemProxy();
      }
    }
    this.preferences = await this.deps.settings.update({ systemProxyEnabled: enabled });
    this.emitChange();
  }

  /** Adds a profile from a subscription, or the default template without one. */
  async addProfile(name: string, subscriptionUrl?: string | null): Promise<Profile> {
    return this.adoptIfActive(await this.deps.profiles.add(name, subscriptionUrl));
  }

  async importProfile(sourcePath: string, name: string): Promise<Profile> {
    return this.adoptIfActive(await this.deps.profiles.importFile(sourcePath, name));
  }

  /** Activates another profile; a running core is restarted on it. */
  async switchProfile(id: string): Promise<Profile> {
    if (this.activeProfile?.id === id) return { ...this.activeProfile };

    const profile = await this.deps.profiles.activate(id);
    this.activeProfile = profile;
    this.deps.registry.clear();

    if (this.deps.supervisor.getState() === 'running') {
      await this.restartProxy();
    } else {
      await this.deps.registry.loadNodes();
    }
    return profile;
  }

  /** Pulls a subscription again; the running core is restarted when it uses that profile. */
  async refreshProfile(id: string): Promise<Profile> {
    const profile = await this.deps.profiles.refresh(id);
    if (!profile.active) return profile;

    this.activeProfile = profile;
    if (this.deps.supervisor.getState() === 'running') {
      await this.restartProxy();
    } else {
      await this.deps.registry.loadNodes();
    }
    return profile;
  }

  /**
   * Deletes a profile. When it was the active one the next profile takes
   * over; a running core keeps the configuration it loaded until restarted.
   */
  async removeProfile(id: string): Promise<void> {
    const wasActive = this.activeProfile?.id === id;
    await this.deps.profiles.remove(id);
    this.activeProfile = await this.deps.profiles.active();
    if (!wasActive) return;

    this.deps.registry.clear();
    if (this.deps.supervisor.getState() !== 'running') {
      await this.deps.registry.loadNodes();
    }
    this.emitChange();
  }

  async shutdown(): Promise<StopResult> {
    this.deps.sampler.stop();
    this.deps.registry.stopHealthCheck();
    return this.stopProxy();
  }

  // the first profile in an empty store becomes active as it is created
  private async adoptIfActive(profile: Profile): Promise<Profile> {
    if (!profile.active) return profile;

    this.activeProfile = profile;
    this.deps.registry.clear();
    if (this.deps.supervisor.getState() !== 'running') {
      await this.deps.registry.loadNodes();
    }
    this.emitChange();
    return profile;
  }

  private async requireConfigPath(): Promise<string> {
    const configPath = await this.deps.profiles.activePath();
    if (!configPath) throw new ConfigNotFoundError();
    return configPath;
  }

  private async afterCoreStarted(): Promise<void> {
    try {
      await this.deps.client.patchConfigs({ mode: this.preferences.mode });
    } catch (err) {
      logger.warn({ module: 'services.session', mode: this.preferences.mode, error_detail: errorMessage(err) }, 'Mode alignment fail');
    }
    try {
      await this.deps.registry.loadNodes();
    } catch (err) {
      logger.warn({ module: 'services.session', error_detail: errorMessage(err) }, 'Node load after start fail');
    }
  }

  private async applySystemProxyPreference(configPath: string): Promise<StartResult> {
    if (!this.preferences.systemProxyEnabled) return { status: 'started' };
    try {
      await this.applySystemProxy(configPath);
      return { status: 'started' };
    } catch (err) {
      logger.warn({ module: 'services.session', error_detail: errorMessage(err) }, 'Proxy started without system proxy');
      return { status: 'partial', systemProxyError: errorMessage(err) };
    }
  }

  private async applySystemProxy(configPath: string): Promise<void> {
    const { http, socks } = proxyEndpoints(await this.listenerPorts(configPath));
    await this.deps.systemProxy.apply(true, http, socks);
    this.emitChange();
  }

  /** Ports the core is listening on, falling back to the profile file when the core cannot say. */
  private async listenerPorts(configPath: string): Promise<ProfilePorts | null> {
    try {
      const configs = await this.deps.client.getConfigs();
      return {
        http: configs.port ?? null,
        socks: configs['socks-port'] ?? null,
        mixed: configs['mixed-port'] ?? null,
      };
    } catch (err) {
      logger.warn({ module: 'services.session', error_detail: errorMessage(err) }, 'Core ports unreadable, using profile');
    }
    try {
      return (await readProfileConfig(configPath)).ports;
    } catch (err) {
      logger.warn({ module: 'services.session', config_path: configPath, error_detail: errorMessage(err) }, 'Profile ports unreadable, using defaults');
      return null;
    }
  }

  private async revertSystemProxy(): Promise<void> {
    await this.deps.systemProxy.apply(false, null, null);
    this.emitChange();
  }

  private async handleUnexpectedExit(): Promise<void> {
    this.deps.sampler.stop();
    this.deps.registry.stopHealthCheck();
    if (this.deps.systemProxy.currentlyApplied()) {
      try {
        await this.revertSystemProxy();
      } catch (err) {
        logger.error({ module: 'services.session', error_detail: errorMessage(err) }, 'System proxy revert after crash fail');
      }
    }
    await this.deps.registry.loadNodes();
    this.emitChange();
  }

  private emitChange(): void {
    this.events.emit('changed', this.snapshot());
  }
}
