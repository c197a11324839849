// Path: src/gates/file-gate.ts
// Gate that finishes when a path appears (or disappears)

import { stat } from 'node:fs/promises';
import { CompletionGate, type CompletionGateOptions } from '../completion-gate.js';

export interface FileGateOptions extends CompletionGateOptions {
  /** Wait for the path to be removed instead of created */
  absent?: boolean;
}

/**
 * Finishes once `path` exists, or once it no longer exists with `absent: true`.
 */
export class FileGate extends CompletionGate {
  private readonly path: string;
  private readonly absent: boolean;

  constructor(path: string, options: FileGateOptions = {}) {
    super(options);
    this.path = path;
    this.absent = options.absent ?? false;
  }

  protected async isConditionMet(): Promise<boolean> {
    const exists = await pathExists(this.path);
    return this.absent ? !exists : exists;
  }

  describe(): string {
    return `<FileGate: ${this.path} ${this.absent ? 'removed' : 'exists'}>`;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}
