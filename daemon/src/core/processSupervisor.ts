import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import {
  AlreadyRunningError,
  ExecutableMissingError,
  OperationInProgressError,
  ProcessExitedError,
  StartupTimeoutError,
  errorMessage,
} from '../errors';
import { sleep } from '../utils/async';
import { isExecutable, spawnCore as defaultSpawnCore } from './spawnCore';
import type { CoreProcess, SpawnCore } from './spawnCore';
import type { ControlApi } from '../clients/controlApiClient';
import type { CoreState, ProcessHandle } from '../types';

export interface SupervisorOptions {
  binaryPath: string;
  workDir: string;
  logsDir: string;
  controlAddress: string;
  readyTimeoutMs: number;
  readyPollMs: number;
  restartSettleMs: number;
  stopGraceMs: number;
  spawnCore?: SpawnCore;
  checkExecutable?: (binaryPath: string) => Promise<boolean>;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

type LifecycleOperation = 'start' | 'stop' | 'restart';

/**
 * Owns the single proxy core process.
 *
 * start, stop and restart are serialized through one gate: while an
 * operation is in flight (including the asynchronous exit confirmation
 * that follows stop) any other lifecycle call fails with
 * OperationInProgressError.
 */
export class ProcessSupervisor {
  private state: CoreState = 'stopped';
  private child: CoreProcess | null = null;
  private handle: ProcessHandle | null = null;
  private logStream: fs.WriteStream | null = null;
  private gate: LifecycleOperation | null = null;
  private stopRequested = false;
  private lastExit: ExitInfo | null = null;
  private escalationTimers: NodeJS.Timeout[] = [];
  private exitWaiters: Array<() => void> = [];
  private events = new EventEmitter();
  private spawnCore: SpawnCore;
  private checkExecutable: (binaryPath: string) => Promise<boolean>;

  constructor(private client: Pick<ControlApi, 'ping'>, private options: SupervisorOptions) {
    this.spawnCore = options.spawnCore || defaultSpawnCore;
    this.checkExecutable = options.checkExecutable || isExecutable;
  }

  getState(): CoreState {
    return this.state;
  }

  getHandle(): ProcessHandle | null {
    return this.handle ? { ...this.handle, args: { ...this.handle.args } } : null;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  onStateChange(listener: (state: CoreState, previous: CoreState) => void): () => void {
    this.events.on('state', listener);
    return () => this.events.off('state', listener);
  }

  onUnexpectedExit(listener: (exit: ExitInfo) => void): () => void {
    this.events.on('unexpectedExit', listener);
    return () => this.events.off('unexpectedExit', listener);
  }

  async start(configPath: string): Promise<void> {
    if (this.gate) throw new OperationInProgressError(this.gate);
    if (this.state !== 'stopped') throw new AlreadyRunningError(this.state);

    this.gate = 'start';
    try {
      await this.launch(configPath);
    } finally {
      this.gate = null;
    }
  }

  /**
   * Signals the core to terminate and returns without waiting for the
   * OS-level exit; the gate stays closed until the exit is confirmed.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    if (this.gate === 'stop') return;
    if (this.gate) throw new OperationInProgressError(this.gate);

    this.gate = 'stop';
    this.terminate();
  }

  async restart(configPath: string): Promise<void> {
    if (this.gate) throw new OperationInProgressError(this.gate);

    this.gate = 'restart';
    try {
      if (this.state !== 'stopped') {
        this.terminate();
        await this.whenStopped();
      }
      // the old process can hold the controller port briefly after exit
      await sleep(this.options.restartSettleMs);
      await this.launch(configPath);
    } finally {
      this.gate = null;
    }
  }

  whenStopped(): Promise<void> {
    if (this.state === 'stopped') return Promise.resolve();
    return new Promise((resolve) => this.exitWaiters.push(resolve));
  }

  private async launch(configPath: string): Promise<void> {
    const { binaryPath, workDir, logsDir, controlAddress } = this.options;

    if (!(await this.checkExecutable(binaryPath))) {
      logger.error({ module: 'core.processSupervisor', binary_path: binaryPath }, 'Core executable missing');
      throw new ExecutableMissingError(binaryPath);
    }

    await fs.promises.mkdir(logsDir, { recursive: true });
    await fs.promises.mkdir(workDir, { recursive: true });
    const logPath = path.join(logsDir, 'core.log');
    const logStream = fs.createWriteStream(logPath, { flags: 'a' });
    logStream.on('error', (err) => {
      logger.warn({ module: 'core.processSupervisor', log_path: logPath, error_detail: err.message }, 'Core log write fail');
    });
    const args = ['-d', workDir, '-f', configPath, '-ext-ctl', controlAddress];

    let child: CoreProcess;
    try {
      child = this.spawnCore(binaryPath, args, { cwd: workDir });
    } catch (err) {
      logStream.end();
      logger.error({ module: 'core.processSupervisor', binary_path: binaryPath, error_detail: errorMessage(err) }, 'Core spawn fail');
      throw new ExecutableMissingError(binaryPath);
    }

    child.stdout?.pipe(logStream, { end: false });
    child.stderr?.pipe(logStream, { end: false });

    this.child = child;
    this.logStream = logStream;
    this.stopRequested = false;
    this.lastExit = null;
    this.handle = {
      pid: child.pid ?? null,
      args: { workDir, configPath, controlAddress },
      logPath,
      startedAt: new Date().toISOString(),
    };

    child.onExit((code, signal) => this.handleExit(child, { code, signal }));
    child.onError((err) => {
      logger.error({ module: 'core.processSupervisor', pid: child.pid, error_detail: err.message }, 'Core process error');
      this.handleExit(child, { code: null, signal: null });
    });

    logger.info({
      module: 'core.processSupervisor',
      pid: child.pid,
      binary_path: binaryPath,
      config_path: configPath,
      controller: controlAddress,
      log_path: logPath,
    }, 'Core spawned');

    this.setState('starting');
    await this.waitForReady(child);
    this.setState('running');
  }

  private async waitForReady(child: CoreProcess): Promise<void> {
    const { readyTimeoutMs, readyPollMs } = this.options;
    const deadline = Date.now() + readyTimeoutMs;
    let attempts = 0;

    for (;;) {
      if (this.child !== child) throw this.exitedDuringStartup();

      attempts++;
      try {
        await this.client.ping({ timeoutMs: Math.max(1, Math.min(readyPollMs, deadline - Date.now())) });
        if (this.child !== child) throw this.exitedDuringStartup();
        logger.info({ module: 'core.processSupervisor', pid: child.pid, attempts }, 'Control API ready');
        return;
      } catch (err) {
        if (err instanceof ProcessExitedError) throw err;
        logger.trace({ module: 'core.processSupervisor', attempts, error_detail: errorMessage(err) }, 'Control API not ready');
      }

      if (this.child !== child) throw this.exitedDuringStartup();

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        logger.error({ module: 'core.processSupervisor', pid: child.pid, timeout_ms: readyTimeoutMs, attempts }, 'Core startup timeout');
        await this.abortLaunch(child);
        throw new StartupTimeoutError(readyTimeoutMs);
      }

      await sleep(Math.min(readyPollMs, remaining));
    }
  }

  private exitedDuringStartup(): ProcessExitedError {
    const exit = this.lastExit;
    logger.error({
      module: 'core.processSupervisor',
      exit_code: exit?.code ?? null,
      signal: exit?.signal ?? null,
    }, 'Core exited during startup');
    return new ProcessExitedError(exit?.code ?? null, exit?.signal ?? null);
  }

  private async abortLaunch(child: CoreProcess): Promise<void> {
    if (this.child !== child) return;
    this.stopRequested = true;
    child.kill('SIGKILL');
    await Promise.race([this.whenStopped(), sleep(this.options.stopGraceMs)]);
    if (this.child === child) {
      logger.error({ module: 'core.processSupervisor', pid: child.pid }, 'Core exit unconfirmed, dropping handle');
      this.handleExit(child, { code: null, signal: 'SIGKILL' });
    }
  }

  private terminate(): void {
    const child = this.child;
    if (!child) return;

    this.stopRequested = true;
    this.setState('stopping');
    child.kill('SIGTERM');
    logger.info({ module: 'core.processSupervisor', pid: child.pid }, 'Core stop requested');

    const grace = this.options.stopGraceMs;
    const escalate = setTimeout(() => {
      if (this.child !== child) return;
      logger.warn({ module: 'core.processSupervisor', pid: child.pid, grace_ms: grace }, 'Core ignored SIGTERM, sending SIGKILL');
      child.kill('SIGKILL');
    }, grace);
    const giveUp = setTimeout(() => {
      if (this.child !== child) return;
      logger.error({ module: 'core.processSupervisor', pid: child.pid }, 'Core exit unconfirmed, dropping handle');
      this.handleExit(child, { code: null, signal: 'SIGKILL' });
    }, grace * 2);
    escalate.unref();
    giveUp.unref();
    this.escalationTimers.push(escalate, giveUp);
  }

  private handleExit(child: CoreProcess, exit: ExitInfo): void {
    if (this.child !== child) return;

    const previous = this.state;
    const expected = this.stopRequested;

    this.escalationTimers.forEach((timer) => clearTimeout(timer));
    this.escalationTimers = [];
    this.child = null;
    this.handle = null;
    this.stopRequested = false;
    this.lastExit = exit;
    this.logStream?.end();
    this.logStream = null;
    if (this.gate === 'stop') this.gate = null;

    this.setState('stopped');

    if (previous === 'running' && !expected) {
      logger.warn({
        module: 'core.processSupervisor',
        pid: child.pid,
        exit_code: exit.code,
        signal: exit.signal,
      }, 'Core terminated unexpectedly');
      this.events.emit('unexpectedExit', exit);
    } else {
      logger.info({ module: 'core.processSupervisor', pid: child.pid, exit_code: exit.code, signal: exit.signal }, 'Core exited');
    }

    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private setState(next: CoreState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    logger.info({ module: 'core.processSupervisor', old_state: previous, new_state: next }, 'Core state changed');
    this.events.emit('state', next, previous);
  }
}
