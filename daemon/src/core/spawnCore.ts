import { spawn } from 'child_process';
import fs from 'fs';
import type { Readable } from 'stream';

export interface CoreProcess {
  readonly pid: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal: NodeJS.Signals): boolean;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: Error) => void): void;
}

export type SpawnCore = (binary: string, args: string[], options: { cwd: string }) => CoreProcess;

export const spawnCore: SpawnCore = (binary, args, options) => {
  const child = spawn(binary, args, {
    cwd: options.cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  return {
    pid: child.pid,
    stdout: child.stdout,
    stderr: child.stderr,
    kill: (signal) => child.kill(signal),
    onExit: (listener) => {
      child.once('exit', listener);
    },
    onError: (listener) => {
      child.once('error', listener);
    },
  };
};

export async function isExecutable(binaryPath: string): Promise<boolean> {
  try {
    await fs.promises.access(binaryPath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
