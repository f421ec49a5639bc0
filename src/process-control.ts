/**
 * @fileoverview OS process primitives used by the coordinator.
 *
 * Liveness, signalling and exit waits are behind the ProcessControl
 * interface so tests can drive the coordinator without real processes.
 *
 * @module process-control
 */

export type StopSignal = 'SIGTERM' | 'SIGKILL';

export interface ProcessControl {
  /** True if a process with this pid exists. */
  isAlive(pid: number): boolean;
  /**
   * Sends a signal.
   * @returns false if the process was already gone
   */
  signal(pid: number, signal: StopSignal): boolean;
  /**
   * Polls until the process is gone or the wait elapses.
   * @returns true if the process exited within `maxWaitMs`
   */
  waitForExit(pid: number, maxWaitMs: number, pollIntervalMs: number): Promise<boolean>;
}

/** Check if a process is alive (signal 0). EPERM means it exists under another user. */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return (err as NodeJS.ErrnoException).code === 'EPERM';
  }
}

export class NodeProcessControl implements ProcessControl {
  isAlive(pid: number): boolean {
    return isProcessAlive(pid);
  }

  /** Signals the process group first; services run detached as group leaders. */
  signal(pid: number, signal: StopSignal): boolean {
    if (!Number.isInteger(pid) || pid <= 0) return false;
    try {
      process.kill(-pid, signal);
      return true;
    } catch (err) {
      // Not a group leader (or already gone): fall through to the pid itself
      if ((err as NodeJS.ErrnoException).code !== 'ESRCH') throw err;
    }
    try {
      process.kill(pid, signal);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ESRCH') return false;
      throw err;
    }
  }

  async waitForExit(pid: number, maxWaitMs: number, pollIntervalMs: number): Promise<boolean> {
    const startTime = Date.now();
    while (Date.now() - startTime < maxWaitMs) {
      if (!this.isAlive(pid)) return true;
      await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
    }
    return !this.isAlive(pid);
  }
}
