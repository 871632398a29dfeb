/**
 * Run Guard - single-instance lock file holding the owner's process id
 */

import * as fs from 'fs';
import * as path from 'path';
import { Logger, errorCode } from '../utils';

export interface RunGuardOptions {
  lockPath: string;
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
}

export interface RunGuardLease {
  pid: number;
  release(): void;
}

export type AcquireResult =
  | { acquired: true; lease: RunGuardLease }
  | { acquired: false; holder: number };

export type GuardedResult<T> =
  | { acquired: true; result: T }
  | { acquired: false; holder: number };

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) === 'EPERM';
  }
}

export class RunGuard {
  private lockPath: string;
  private pid: number;
  private alive: (pid: number) => boolean;

  constructor(options: RunGuardOptions) {
    this.lockPath = options.lockPath;
    this.pid = options.pid ?? process.pid;
    this.alive = options.isProcessAlive ?? isProcessAlive;
  }

  /**
   * Create the token exclusively. If one already exists and names a live
   * process other than ours, report the holder; otherwise the token is stale
   * and is replaced.
   */
  acquire(): AcquireResult {
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });

    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        fs.writeFileSync(this.lockPath, String(this.pid), { flag: 'wx' });
        return { acquired: true, lease: this.lease() };
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw error;
        }
      }

      const holder = this.readHolder();
      if (holder !== null && holder !== this.pid && this.alive(holder)) {
        return { acquired: false, holder };
      }

      Logger.warn('Replacing stale run guard token', { lockPath: this.lockPath, holder });
      fs.rmSync(this.lockPath, { force: true });
    }

    throw new Error(`Could not acquire run guard at ${this.lockPath}`);
  }

  private readHolder(): number | null {
    try {
      const content = fs.readFileSync(this.lockPath, 'utf-8').trim();
      const pid = Number(content);
      return /^\d+$/.test(content) && pid > 0 ? pid : null;
    } catch (error) {
      Logger.warn('Run guard token unreadable', { lockPath: this.lockPath, code: errorCode(error) });
      return null;
    }
  }

  private lease(): RunGuardLease {
    let released = false;
    return {
      pid: this.pid,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        fs.rmSync(this.lockPath, { force: true });
      },
    };
  }
}

/**
 * Run fn while holding the guard. The token is removed on every exit path,
 * including when fn throws.
 */
export async function withRunGuard<T>(guard: RunGuard, fn: () => Promise<T>): Promise<GuardedResult<T>> {
  const acquisition = guard.acquire();
  if (!acquisition.acquired) {
    return acquisition;
  }

  try {
    return { acquired: true, result: await fn() };
  } finally {
    acquisition.lease.release();
  }
}
