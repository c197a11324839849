// Path: test/gates.test.ts
// Tests for the concrete gates

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { PredicateGate } from '../src/gates/predicate-gate.js';
import { FileGate } from '../src/gates/file-gate.js';
import { ProcessExitGate } from '../src/gates/process-gate.js';

const logger = pino({ level: 'silent' });

describe('PredicateGate', () => {
  it('should finish when the predicate holds', async () => {
    let ready = false;
    const gate = new PredicateGate('flag set', () => ready, { logger });

    expect(await gate.poll()).toBe(false);
    ready = true;
    expect(await gate.poll()).toBe(true);
  });

  it('should accept asynchronous predicates', async () => {
    const gate = new PredicateGate('async flag', async () => true, { logger });

    await gate.wait(1);

    expect(gate.isFinished()).toBe(true);
  });

  it('should describe itself', () => {
    expect(new PredicateGate('queue drained', () => true, { logger }).describe()).toBe(
      '<PredicateGate: queue drained>'
    );
  });
});

describe('FileGate', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pollgate-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should finish once the file exists', async () => {
    const path = join(tempDir, 'ready.flag');
    const gate = new FileGate(path, { logger });

    expect(await gate.poll()).toBe(false);
    await writeFile(path, 'ok');
    expect(await gate.poll()).toBe(true);
  });

  it('should finish once the file is removed with absent', async () => {
    const path = join(tempDir, 'app.lock');
    await writeFile(path, '123');
    const gate = new FileGate(path, { absent: true, logger });

    expect(await gate.poll()).toBe(false);
    await rm(path);
    expect(await gate.poll()).toBe(true);
  });

  it('should propagate errors other than a missing path', async () => {
    const file = join(tempDir, 'plain.txt');
    await writeFile(file, 'not a directory');
    const gate = new FileGate(join(file, 'child'), { logger });

    await expect(gate.poll()).rejects.toHaveProperty('code', 'ENOTDIR');
  });

  it('should describe what it waits for', () => {
    expect(new FileGate('/tmp/a', { logger }).describe()).toBe('<FileGate: /tmp/a exists>');
    expect(new FileGate('/tmp/a', { absent: true, logger }).describe()).toBe('<FileGate: /tmp/a removed>');
  });
});

describe('ProcessExitGate', () => {
  it('should finish once the liveness check reports the process gone', async () => {
    const isAlive = vi.fn<(pid: number) => boolean>().mockReturnValueOnce(true).mockReturnValueOnce(false);
    const gate = new ProcessExitGate(4242, { isAlive, logger });

    expect(await gate.poll()).toBe(false);
    expect(await gate.poll()).toBe(true);
    expect(isAlive).toHaveBeenCalledWith(4242);
  });

  it('should see the current process as running', async () => {
    const gate = new ProcessExitGate(process.pid, { logger });

    expect(await gate.poll()).toBe(false);
  });

  it('should describe the pid', () => {
    expect(new ProcessExitGate(99, { logger }).describe()).toBe('<ProcessExitGate: pid 99>');
  });
});
