/**
 * Loopdesk Supervisor — Launch Logger
 *
 * Records one entry per `start_kernel` invocation, success or failure.
 *
 * The sink is optional: without one (tests, embedded use) record() is a
 * no-op. A sink that throws is reported through `onSinkError` and never
 * changes the Launch Result the caller receives. record() does not throw,
 * even when `onSinkError` does.
 */

import type { LaunchLogEntry, LaunchLogSink } from './log-sink.js';

export type SinkErrorHandler = (err: unknown, entry: LaunchLogEntry) => void;

const warnOnSinkError: SinkErrorHandler = (err, entry) => {
  const reason = err instanceof Error ? err.message : String(err);
  // eslint-disable-next-line no-console
  console.warn(`[loopdesk] launch log write failed (${entry.outcome}): ${reason}`);
};

export class LaunchLogger {
  constructor(
    private readonly sink?: LaunchLogSink,
    private readonly onSinkError: SinkErrorHandler = warnOnSinkError,
  ) {}

  record(entry: LaunchLogEntry): void {
    if (this.sink === undefined) return;
    try {
      this.sink.append(entry);
    } catch (err: unknown) {
      this.reportSinkError(err, entry);
    }
  }

  private reportSinkError(err: unknown, entry: LaunchLogEntry): void {
    try {
      this.onSinkError(err, entry);
    } catch (handlerErr: unknown) {
      // The handler failed too; fall back to the default warning for both.
      warnOnSinkError(err, entry);
      warnOnSinkError(handlerErr, entry);
    }
  }
}
