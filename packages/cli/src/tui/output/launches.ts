import { LaunchOutcome, outcomeOfReply } from '@loopdesk/supervisor'
import type { LaunchLogRecord } from '@loopdesk/runtime-host'
import { formatLaunchLogLine } from '../../commands/log.js'
import { outcomeColor, t } from '../theme.js'

/**
 * renderReply — print a start_kernel reply, green on success, red on failure.
 */
export function renderReply(reply: string): void {
  const outcome = outcomeOfReply(reply)
  const mark    = outcome === LaunchOutcome.Spawned ? '✓ ' : '✗ '
  process.stdout.write('\n  ' + outcomeColor(outcome)(mark + reply) + '\n')
}

/**
 * renderLaunches — print launch log records, oldest first.
 */
export function renderLaunches(records: ReadonlyArray<LaunchLogRecord>): void {
  if (records.length === 0) {
    process.stdout.write('\n  ' + t.muted('no launches recorded') + '\n')
    return
  }
  let out = '\n'
  for (const record of records) {
    out += '  ' + outcomeColor(record.outcome)(formatLaunchLogLine(record)) + '\n'
  }
  process.stdout.write(out)
}
