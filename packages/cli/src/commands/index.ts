/**
 * commands/index.ts — Commander program factory.
 *
 * Imported by src/bin/loopdesk.ts (non-interactive / LOOPDESK_NO_TUI path).
 * Each call builds a fresh program, so option values never carry over
 * from one parse to the next.
 */

import { Command } from 'commander'
import { createStartKernelCommand } from './start-kernel.js'
import type { CliRuntimeOverrides } from './start-kernel.js'
import { createLogCommand } from './log.js'

export function buildProgram(overrides: CliRuntimeOverrides = {}): Command {
  return new Command()
    .name('loopdesk')
    .description(
      'Loopdesk — launches the loop kernel process in API mode.\n' +
      'Each start-kernel call launches one detached kernel and reports the outcome.',
    )
    .version('0.1.0')
    .addCommand(createStartKernelCommand(overrides))
    .addCommand(createLogCommand())
}
