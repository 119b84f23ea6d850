#!/usr/bin/env node
/**
 * bin/loopdesk.ts — TTY-aware entry point for the `loopdesk` CLI command.
 *
 * In a TTY with LOOPDESK_NO_TUI unset: launches the interactive readline shell.
 * Otherwise: delegates to Commander (non-interactive / scripting mode).
 *
 * LOOPDESK_NO_TUI=1 loopdesk start-kernel   → Commander
 * loopdesk (in TTY)                         → interactive shell
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['LOOPDESK_NO_TUI'] === undefined && process.argv.length <= 2

if (isInteractive) {
  const { launchShell } = await import('../tui/shell.js')
  launchShell()
} else {
  const { buildProgram } = await import('../commands/index.js')
  await buildProgram().parseAsync()
}
