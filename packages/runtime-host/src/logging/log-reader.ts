/**
 * Loopdesk Runtime Host — Launch Log Reader
 *
 * Pure function over the raw text of `launches.jsonl`.
 *
 * Guarantees:
 *   LOGR-U1: valid lines become records; malformed lines are dropped and counted
 *   LOGR-U2: records are deduplicated by event_id, first occurrence wins
 *   LOGR-U3: content not ending in '\n' has its last (partial) line dropped and flagged
 *   LOGR-U4: records are sorted by (timestamp asc, event_id asc)
 *   LOGR-U5: empty input yields no records and zero counts
 *
 * Callers obtain the raw text with StateIO.readLogRaw().
 */

import { LaunchOutcome } from '@loopdesk/supervisor';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One launch as stored in launches.jsonl. */
export interface LaunchLogRecord {
  /** 26-character ULID; the deduplication key. */
  readonly event_id: string;
  readonly timestamp: string;
  readonly outcome: LaunchOutcome;
  readonly argv: ReadonlyArray<string>;
  readonly pid: number | null;
  readonly error: string | null;
  readonly code: string | null;
  readonly reply: string;
}

export interface LaunchLogStats {
  /** Non-empty complete lines examined. */
  totalLines: number;
  /** Records kept after deduplication. */
  parsedRecords: number;
  /** Lines dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped because they were not JSON or not a launch record. */
  parseErrors: number;
  /** True when the content did not end with '\n'. */
  partialTrailingLine: boolean;
}

export interface LaunchLogReadResult {
  records: ReadonlyArray<LaunchLogRecord>;
  stats: LaunchLogStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readLaunchLog(rawContent: string): LaunchLogReadResult {
  const stats: LaunchLogStats = {
    totalLines: 0,
    parsedRecords: 0,
    duplicates: 0,
    parseErrors: 0,
    partialTrailingLine: rawContent.length > 0 && !rawContent.endsWith('\n'),
  };
  if (rawContent.length === 0) {
    return { records: [], stats };
  }

  const rawLines = rawContent.split('\n');
  // Complete content ends in '\n', leaving an empty last element; partial
  // content leaves the truncated line there. Either way it goes.
  const lines = rawLines.slice(0, -1).filter((l) => l.length > 0);
  stats.totalLines = lines.length;

  const seen = new Set<string>();
  const records: LaunchLogRecord[] = [];

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      stats.parseErrors++;
      continue;
    }

    const record = toLaunchRecord(parsed);
    if (record === null) {
      stats.parseErrors++;
      continue;
    }

    if (seen.has(record.event_id)) {
      stats.duplicates++;
      continue;
    }
    seen.add(record.event_id);
    records.push(record);
  }
  stats.parsedRecords = records.length;

  records.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return { records, stats };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const OUTCOMES: ReadonlyMap<string, LaunchOutcome> = new Map(
  Object.values(LaunchOutcome).map((o) => [o, o] as const),
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null | undefined {
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

/** Validate one parsed line; null when it is not a launch record. */
function toLaunchRecord(value: unknown): LaunchLogRecord | null {
  if (!isRecord(value)) return null;

  const { event_id, timestamp, outcome, argv, pid, error, code, reply } = value;
  if (typeof event_id !== 'string' || typeof timestamp !== 'string' || typeof reply !== 'string') {
    return null;
  }

  const knownOutcome = typeof outcome === 'string' ? OUTCOMES.get(outcome) : undefined;
  if (knownOutcome === undefined) return null;

  if (!Array.isArray(argv)) return null;
  const args: string[] = [];
  for (const arg of argv) {
    if (typeof arg !== 'string') return null;
    args.push(arg);
  }

  if (pid !== null && typeof pid !== 'number') return null;
  const errorText = stringOrNull(error);
  const errorCode = stringOrNull(code);
  if (errorText === undefined || errorCode === undefined) return null;

  return {
    event_id,
    timestamp,
    outcome: knownOutcome,
    argv: args,
    pid,
    error: errorText,
    code: errorCode,
    reply,
  };
}
