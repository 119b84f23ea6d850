/**
 * Loopdesk Runtime Host — Runtime Assembly Tests
 *
 *   RT-U1: the registry exposes start_kernel and nothing else
 *   RT-U2: start_kernel passes the default argv to the adapter
 *   RT-U3: a failed launch is logged through the injected StateIO
 *   RT-U4: a throwing log writer is reported, and the reply still arrives
 *
 * Isolation: temp home, MemoryStateIO, and an in-test SpawnAdapter.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { SpawnAdapter, SpawnOutcome } from '@loopdesk/supervisor';
import { buildSupervisorRuntime } from '../src/runtime.js';
import { MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';
import { LAUNCH_LOG_FILE } from '../src/logging/file-log-sink.js';
import { readLaunchLog } from '../src/logging/log-reader.js';

class RecordingAdapter implements SpawnAdapter {
  readonly calls: Array<{ command: string; args: ReadonlyArray<string> }> = [];

  constructor(private readonly outcome: SpawnOutcome) {}

  spawnDetached(command: string, args: ReadonlyArray<string>): Promise<SpawnOutcome> {
    this.calls.push({ command, args });
    return Promise.resolve(this.outcome);
  }
}

class BrokenStateIO implements StateIO {
  appendLine(): void {
    throw new Error('disk full');
  }

  readLogRaw(): string {
    return '';
  }
}

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'loopdesk-rt-'));
}

describe('buildSupervisorRuntime', () => {
  it('RT-U1: the registry exposes start_kernel and nothing else', () => {
    const runtime = buildSupervisorRuntime({
      home: tempHome(),
      stateIO: new MemoryStateIO(),
      adapter: new RecordingAdapter({ ok: true, pid: 1 }),
    });

    expect(runtime.registry.list()).toEqual(['start_kernel']);
    expect(runtime.api.commands()).toEqual(['start_kernel']);
  });

  it('RT-U2: start_kernel passes the default argv to the adapter', async () => {
    const adapter = new RecordingAdapter({ ok: true, pid: 7 });
    const runtime = buildSupervisorRuntime({
      home: tempHome(),
      stateIO: new MemoryStateIO(),
      adapter,
    });

    expect(await runtime.api.startKernel()).toBe('Kernel Process Spawned (API Mode)');
    expect(adapter.calls).toEqual([{ command: 'python3', args: ['loop', 'serve'] }]);
  });

  it('RT-U3: a failed launch is logged through the injected StateIO', async () => {
    const stateIO = new MemoryStateIO();
    const runtime = buildSupervisorRuntime({
      home: tempHome(),
      stateIO,
      adapter: new RecordingAdapter({ ok: false, message: 'permission denied', code: 'EACCES' }),
    });

    const reply = await runtime.api.startKernel();

    expect(reply).toBe('Failed to spawn kernel: permission denied');
    const { records } = readLaunchLog(stateIO.readLogRaw(LAUNCH_LOG_FILE));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      outcome: 'SpawnFailed',
      pid: null,
      error: 'permission denied',
      code: 'EACCES',
      reply,
    });
  });

  it('RT-U4: a throwing log writer is reported, and the reply still arrives', async () => {
    const reported: string[] = [];
    const runtime = buildSupervisorRuntime({
      home: tempHome(),
      stateIO: new BrokenStateIO(),
      adapter: new RecordingAdapter({ ok: true, pid: 9 }),
      onLogError: (err) => reported.push(err instanceof Error ? err.message : String(err)),
    });

    expect(await runtime.api.startKernel()).toBe('Kernel Process Spawned (API Mode)');
    expect(reported).toEqual(['disk full']);
  });
});
