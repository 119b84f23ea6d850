/**
 * loopdesk log — Show recorded kernel launches
 *
 * Reads `<home>/logs/launches.jsonl`, one entry per `start_kernel`
 * invocation, oldest first. `--limit` keeps the newest N.
 */

import { Command } from 'commander';
import { LaunchOutcome } from '@loopdesk/supervisor';
import {
  FileStateIO,
  LAUNCH_LOG_FILE,
  readLaunchLog,
  resolveLoopdeskHome,
} from '@loopdesk/runtime-host';
import type { LaunchLogReadResult, LaunchLogRecord } from '@loopdesk/runtime-host';
import { errorMessage } from './errors.js';

const DEFAULT_LIMIT = 20;

/**
 * One line per launch:
 *   2026-03-01T09:30:00.000Z  Spawned      pid 4242  python3 loop serve
 *   2026-03-01T09:31:00.000Z  SpawnFailed  ENOENT    python3 loop serve  (spawn python3 ENOENT)
 */
export function formatLaunchLogLine(record: LaunchLogRecord): string {
  const status = record.outcome.padEnd(11);
  const command = record.argv.join(' ');
  if (record.outcome === LaunchOutcome.Spawned) {
    const pid = record.pid === null ? 'pid ?' : `pid ${record.pid}`;
    return `${record.timestamp}  ${status}  ${pid.padEnd(8)}  ${command}`;
  }
  const code = record.code ?? '-';
  return `${record.timestamp}  ${status}  ${code.padEnd(8)}  ${command}  (${record.error ?? 'unknown error'})`;
}

/**
 * Parse a --limit value: decimal digits only, greater than zero.
 * Returns `fallback` when no value was given and null when it is invalid.
 */
export function parseLimit(raw: string | undefined, fallback: number = DEFAULT_LIMIT): number | null {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return n > 0 ? n : null;
}

/** The newest `limit` records, still oldest first. */
export function tailRecords(result: LaunchLogReadResult, limit: number): ReadonlyArray<LaunchLogRecord> {
  return result.records.slice(-limit);
}

export function createLogCommand(): Command {
  return new Command('log')
    .description('Show recorded kernel launches, newest last')
    .option('--limit <n>', `Maximum number of launches to show (default ${DEFAULT_LIMIT})`)
    .option('--json', 'Output as JSON')
    .option('--home <dir>', 'Home directory holding the launch log (overrides LOOPDESK_HOME)')
    .action((options: { limit?: string; json?: boolean; home?: string }) => {
      const limit = parseLimit(options.limit);
      if (limit === null) {
        // eslint-disable-next-line no-console
        console.error(`[loopdesk log] --limit must be a positive integer, got '${options.limit ?? ''}'`);
        process.exit(1);
      }

      let result: LaunchLogReadResult;
      try {
        const home = resolveLoopdeskHome({ home: options.home });
        result = readLaunchLog(new FileStateIO(home).readLogRaw(LAUNCH_LOG_FILE));
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`[loopdesk log] ${errorMessage(err)}`);
        process.exit(1);
      }

      const records = tailRecords(result, limit);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ records, stats: result.stats }, null, 2));
        return;
      }

      if (records.length === 0) {
        // eslint-disable-next-line no-console
        console.log('No launches recorded.');
        return;
      }
      for (const record of records) {
        // eslint-disable-next-line no-console
        console.log(formatLaunchLogLine(record));
      }
      if (result.stats.parseErrors > 0 || result.stats.partialTrailingLine) {
        // eslint-disable-next-line no-console
        console.warn(
          `[loopdesk log] skipped ${result.stats.parseErrors} unreadable line(s)` +
          (result.stats.partialTrailingLine ? ' and a partial trailing line' : ''),
        );
      }
    });
}
