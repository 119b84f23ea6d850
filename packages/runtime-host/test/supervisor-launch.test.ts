/**
 * Loopdesk Runtime Host — start_kernel End-to-End Tests
 *
 * Drives `start_kernel` through buildSupervisorRuntime() with the real
 * NodeSpawnAdapter. The "interpreter" is Node itself and the "module" is a
 * fixture script, so argv is [node, fake-kernel.mjs, serve].
 *
 *   E2E-U1: interpreter present → success reply, one child launched with [interp, module, serve]
 *   E2E-U2: interpreter absent → failure reply, nothing launched, failure logged
 *   E2E-U3: two rapid calls → two success replies, two distinct children
 *   E2E-U4: the child inherits the host's working directory and environment
 *
 * Isolation: each test gets a temp LOOPDESK_HOME and a temp fixture output dir.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { LaunchOutcome } from '@loopdesk/supervisor';
import { buildSupervisorRuntime } from '../src/runtime.js';
import { readLaunchLog } from '../src/logging/log-reader.js';
import { LAUNCH_LOG_FILE } from '../src/logging/file-log-sink.js';

const FAKE_KERNEL = fileURLToPath(new URL('./fixtures/fake-kernel.mjs', import.meta.url));
const MISSING_BINARY = 'loopdesk-missing-interpreter-7f3a';

interface FakeKernelRecord {
  argv: string[];
  cwd: string;
}

let outDir: string;
let home: string;
let savedOut: string | undefined;

beforeEach(() => {
  savedOut = process.env['LOOPDESK_FAKE_KERNEL_OUT'];
  outDir = mkdtempSync(join(tmpdir(), 'loopdesk-e2e-out-'));
  home = mkdtempSync(join(tmpdir(), 'loopdesk-e2e-home-'));
  process.env['LOOPDESK_FAKE_KERNEL_OUT'] = outDir;
});

afterEach(() => {
  if (savedOut === undefined) {
    delete process.env['LOOPDESK_FAKE_KERNEL_OUT'];
  } else {
    process.env['LOOPDESK_FAKE_KERNEL_OUT'] = savedOut;
  }
});

function isFakeKernelRecord(value: unknown): value is FakeKernelRecord {
  if (typeof value !== 'object' || value === null || !('argv' in value) || !('cwd' in value)) {
    return false;
  }
  const { argv, cwd } = value;
  return Array.isArray(argv) && argv.every((a) => typeof a === 'string') && typeof cwd === 'string';
}

async function waitForRecord(pid: number): Promise<FakeKernelRecord> {
  const file = join(outDir, `${pid}.json`);
  await vi.waitFor(() => {
    expect(existsSync(file)).toBe(true);
  }, { timeout: 5000, interval: 25 });
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!isFakeKernelRecord(parsed)) {
    throw new Error(`unexpected fake kernel record: ${JSON.stringify(parsed)}`);
  }
  return parsed;
}

function loggedPids(runtimeHome: string): number[] {
  const raw = readFileSync(join(runtimeHome, 'logs', LAUNCH_LOG_FILE), 'utf-8');
  return readLaunchLog(raw).records.flatMap((r) => (r.pid === null ? [] : [r.pid]));
}

describe('start_kernel end to end', () => {
  it('E2E-U1: interpreter present → success reply and one child with [interp, module, serve]', async () => {
    const runtime = buildSupervisorRuntime({
      home,
      launch: { interpreter: process.execPath, module: FAKE_KERNEL },
    });

    const reply = await runtime.registry.invoke('start_kernel');

    expect(reply).toBe('Kernel Process Spawned (API Mode)');
    const pids = loggedPids(home);
    expect(pids).toHaveLength(1);
    const record = await waitForRecord(pids[0]!);
    expect(record.argv).toEqual([FAKE_KERNEL, 'serve']);
    expect(runtime.supervisor.kernelArgv).toEqual([process.execPath, FAKE_KERNEL, 'serve']);
  });

  it('E2E-U2: interpreter absent → failure reply, nothing launched', async () => {
    const runtime = buildSupervisorRuntime({
      home,
      launch: { interpreter: MISSING_BINARY },
    });

    const reply = await runtime.api.startKernel();

    expect(reply).toBe(`Failed to spawn kernel: spawn ${MISSING_BINARY} ENOENT`);
    const { records } = readLaunchLog(runtime.stateIO.readLogRaw(LAUNCH_LOG_FILE));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      outcome: LaunchOutcome.SpawnFailed,
      argv: [MISSING_BINARY, 'loop', 'serve'],
      pid: null,
      code: 'ENOENT',
      reply,
    });
    expect(readdirSync(outDir)).toEqual([]);
  });

  it('E2E-U3: two rapid calls → two success replies and two distinct children', async () => {
    const runtime = buildSupervisorRuntime({
      home,
      launch: { interpreter: process.execPath, module: FAKE_KERNEL },
    });

    const replies = await Promise.all([runtime.api.startKernel(), runtime.api.startKernel()]);

    expect(replies).toEqual(['Kernel Process Spawned (API Mode)', 'Kernel Process Spawned (API Mode)']);
    const pids = loggedPids(home);
    expect(pids).toHaveLength(2);
    expect(new Set(pids).size).toBe(2);
    for (const pid of pids) {
      expect((await waitForRecord(pid)).argv).toEqual([FAKE_KERNEL, 'serve']);
    }
  });

  it('E2E-U4: the child inherits the working directory and environment', async () => {
    const runtime = buildSupervisorRuntime({
      home,
      launch: { interpreter: process.execPath, module: FAKE_KERNEL },
    });

    await runtime.api.startKernel();

    // The fixture only writes because LOOPDESK_FAKE_KERNEL_OUT reached it.
    const record = await waitForRecord(loggedPids(home)[0]!);
    expect(record.cwd).toBe(process.cwd());
  });
});
