// Path: src/gates/process-gate.ts
// Gate that finishes when a process exits

import { CompletionGate, type CompletionGateOptions } from '../completion-gate.js';

/**
 * Returns whether the process is still running
 */
export type LivenessCheck = (pid: number) => boolean;

export interface ProcessExitGateOptions extends CompletionGateOptions {
  /** Liveness check (default: process.kill(pid, 0)) */
  isAlive?: LivenessCheck;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 = check if process exists
    return true;
  } catch (err) {
    // EPERM: alive, owned by another user
    if (err instanceof Error && 'code' in err && err.code === 'EPERM') {
      return true;
    }
    return false;
  }
}

/**
 * Finishes once the process with the given pid has exited.
 */
export class ProcessExitGate extends CompletionGate {
  private readonly pid: number;
  private readonly isAlive: LivenessCheck;

  constructor(pid: number, options: ProcessExitGateOptions = {}) {
    super(options);
    this.pid = pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  protected isConditionMet(): boolean {
    return !this.isAlive(this.pid);
  }

  describe(): string {
    return `<ProcessExitGate: pid ${this.pid}>`;
  }
}
