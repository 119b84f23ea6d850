/**
 * Loopdesk Runtime Host — Launch Log Tests
 *
 *   LOG-U1: FileLaunchLogSink writes one JSONL line with a ULID event_id
 *   LOG-U2: two appended entries get distinct event_ids
 *   LOGR-U1: malformed lines and non-launch objects are dropped and counted
 *   LOGR-U2: duplicate event_ids are dropped, first occurrence wins
 *   LOGR-U3: a partial trailing line is dropped and flagged
 *   LOGR-U4: records come back sorted by (timestamp, event_id)
 *   LOGR-U5: empty input yields no records
 *   ULID-U1: ulid() encodes the timestamp in its first 10 characters
 *
 * Isolation: MemoryStateIO only; no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { LaunchOutcome } from '@loopdesk/supervisor';
import type { LaunchLogEntry } from '@loopdesk/supervisor';
import { FileLaunchLogSink, LAUNCH_LOG_FILE } from '../src/logging/file-log-sink.js';
import { readLaunchLog } from '../src/logging/log-reader.js';
import { ulid } from '../src/logging/ulid.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

function spawnedEntry(pid: number): LaunchLogEntry {
  return {
    timestamp: '2026-03-01T09:30:00.000Z',
    outcome: LaunchOutcome.Spawned,
    argv: ['python3', 'loop', 'serve'],
    pid,
    error: null,
    code: null,
    reply: 'Kernel Process Spawned (API Mode)',
  };
}

function line(eventId: string, timestamp: string, pid: number): string {
  return JSON.stringify({
    event_id: eventId,
    timestamp,
    outcome: 'Spawned',
    argv: ['python3', 'loop', 'serve'],
    pid,
    error: null,
    code: null,
    reply: 'Kernel Process Spawned (API Mode)',
  });
}

describe('FileLaunchLogSink', () => {
  it('LOG-U1: writes one JSONL line with a ULID event_id', () => {
    const stateIO = new MemoryStateIO();
    new FileLaunchLogSink(stateIO).append(spawnedEntry(4242));

    const lines = stateIO.readLines(LAUNCH_LOG_FILE);
    expect(lines).toHaveLength(1);

    const { records, stats } = readLaunchLog(stateIO.readLogRaw(LAUNCH_LOG_FILE));
    expect(stats.parseErrors).toBe(0);
    expect(records[0]?.event_id).toMatch(ULID_PATTERN);
    expect(records[0]).toMatchObject({ ...spawnedEntry(4242) });
  });

  it('LOG-U2: two appended entries get distinct event_ids', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLaunchLogSink(stateIO);
    sink.append(spawnedEntry(1));
    sink.append(spawnedEntry(2));

    const { records } = readLaunchLog(stateIO.readLogRaw(LAUNCH_LOG_FILE));
    expect(records).toHaveLength(2);
    expect(records[0]?.event_id).not.toBe(records[1]?.event_id);
  });
});

describe('readLaunchLog', () => {
  it('LOGR-U1: malformed lines and non-launch objects are dropped and counted', () => {
    const raw = [
      line('01A', '2026-03-01T09:00:00.000Z', 10),
      '{ not json',
      JSON.stringify({ event_id: '01B', timestamp: '2026-03-01T09:01:00.000Z', outcome: 'Exploded' }),
      '',
    ].join('\n');

    const { records, stats } = readLaunchLog(raw);

    expect(records.map((r) => r.event_id)).toEqual(['01A']);
    expect(stats).toEqual({
      totalLines: 3,
      parsedRecords: 1,
      duplicates: 0,
      parseErrors: 2,
      partialTrailingLine: false,
    });
  });

  it('LOGR-U2: duplicate event_ids are dropped, first occurrence wins', () => {
    const raw = line('01A', '2026-03-01T09:00:00.000Z', 10) + '\n' +
      line('01A', '2026-03-01T09:00:00.000Z', 99) + '\n';

    const { records, stats } = readLaunchLog(raw);

    expect(records.map((r) => r.pid)).toEqual([10]);
    expect(stats.duplicates).toBe(1);
  });

  it('LOGR-U3: a partial trailing line is dropped and flagged', () => {
    const raw = line('01A', '2026-03-01T09:00:00.000Z', 10) + '\n{"event_id":"01B","times';

    const { records, stats } = readLaunchLog(raw);

    expect(records).toHaveLength(1);
    expect(stats.partialTrailingLine).toBe(true);
    expect(stats.totalLines).toBe(1);
  });

  it('LOGR-U4: records come back sorted by (timestamp, event_id)', () => {
    const raw = [
      line('01C', '2026-03-01T09:05:00.000Z', 3),
      line('01B', '2026-03-01T09:00:00.000Z', 2),
      line('01A', '2026-03-01T09:00:00.000Z', 1),
    ].join('\n') + '\n';

    expect(readLaunchLog(raw).records.map((r) => r.event_id)).toEqual(['01A', '01B', '01C']);
  });

  it('LOGR-U5: empty input yields no records', () => {
    expect(readLaunchLog('')).toEqual({
      records: [],
      stats: {
        totalLines: 0,
        parsedRecords: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
      },
    });
  });
});

describe('ulid', () => {
  it('ULID-U1: encodes the timestamp in its first 10 characters', () => {
    const id = ulid(0);

    expect(id).toMatch(ULID_PATTERN);
    expect(id.slice(0, 10)).toBe('0000000000');
    expect(ulid(1).slice(0, 10)).toBe('0000000001');
    expect(ulid(32).slice(0, 10)).toBe('0000000010');
  });
});
