/**
 * Loopdesk Runtime Host — File-backed Launch Log Sink
 *
 * Implements LaunchLogSink from @loopdesk/supervisor by appending one JSONL
 * line per `start_kernel` invocation to `logs/launches.jsonl` through the
 * injected StateIO. Each line gets a ULID `event_id` so copies of the log
 * merged from several machines can be deduplicated on read.
 */

import type { LaunchLogEntry, LaunchLogSink } from '@loopdesk/supervisor';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const LAUNCH_LOG_FILE = 'launches.jsonl';

export class FileLaunchLogSink implements LaunchLogSink {
  constructor(private readonly stateIO: StateIO) {}

  append(entry: LaunchLogEntry): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: entry.timestamp,
      outcome: entry.outcome,
      argv: entry.argv,
      pid: entry.pid,
      error: entry.error,
      code: entry.code,
      reply: entry.reply,
    });
    this.stateIO.appendLine(LAUNCH_LOG_FILE, line);
  }
}
