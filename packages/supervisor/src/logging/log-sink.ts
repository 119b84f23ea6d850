/**
 * Loopdesk Supervisor — Launch Log Sink Interface
 *
 * The supervisor owns this contract and the LaunchLogger class. Concrete
 * sinks live in the runtime host and are injected at construction; the
 * supervisor never writes to disk itself.
 */

import type { LaunchOutcome } from '../types/launch.js';

/** One recorded `start_kernel` invocation. */
export interface LaunchLogEntry {
  /** ISO 8601 time the invocation completed. */
  readonly timestamp: string;
  readonly outcome: LaunchOutcome;
  /** Full argument vector, interpreter first. */
  readonly argv: ReadonlyArray<string>;
  /** Child pid on success, when the host reported one. */
  readonly pid: number | null;
  /** OS error description on failure. */
  readonly error: string | null;
  /** errno code on failure, when the host reported one. */
  readonly code: string | null;
  /** The exact reply string handed back to the caller. */
  readonly reply: string;
}

/**
 * A sink that persists launch log entries.
 *
 * append() is synchronous; the entry is written before the supervisor
 * returns its reply.
 */
export interface LaunchLogSink {
  append(entry: LaunchLogEntry): void;
}
