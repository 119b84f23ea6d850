/**
 * shell.ts — Loopdesk interactive readline shell.
 *
 * Two layers:
 *
 * LAYER 1 — READLINE
 *   Node.js readline owns the prompt, line editing, history and Ctrl+C.
 *
 * LAYER 2 — STDOUT OUTPUT
 *   Direct process.stdout.write() with chalk coloring. Append-only.
 *
 * One runtime is built at startup and shared by every command in the
 * session, so `start` goes through the same registry each time.
 */

import * as readline from 'node:readline'
import { homedir } from 'node:os'
import { LAUNCH_LOG_FILE, buildSupervisorRuntime, readLaunchLog } from '@loopdesk/runtime-host'
import type { SupervisorRuntime, SupervisorRuntimeOptions } from '@loopdesk/runtime-host'
import { parseLimit } from '../commands/log.js'
import { errorMessage } from '../commands/errors.js'
import { renderHeader } from './output/header.js'
import { renderHelp } from './output/help.js'
import { renderLaunches, renderReply } from './output/launches.js'
import { buildPS1, shortenHome } from './prompt.js'
import { t } from './theme.js'

const DEFAULT_LOG_COUNT = 10

function printError(err: unknown): void {
  process.stdout.write('\n  ' + t.red(errorMessage(err)) + '\n')
}

function printUnknown(input: string): void {
  process.stdout.write(
    '\n  ' + t.red('unknown command: ') + t.muted(input) +
    '\n  ' + t.dim("type 'help' for available commands") + '\n'
  )
}

/**
 * parseLogCount — the `n` of `log [n]`. Same rules as `loopdesk log --limit`.
 */
export function parseLogCount(arg: string): number | null {
  return parseLimit(arg === '' ? undefined : arg, DEFAULT_LOG_COUNT)
}

function showLog(runtime: SupervisorRuntime, arg: string): void {
  const count = parseLogCount(arg)
  if (count === null) {
    process.stdout.write('\n  ' + t.red('usage: log [n]') + '\n')
    return
  }
  const { records } = readLaunchLog(runtime.stateIO.readLogRaw(LAUNCH_LOG_FILE))
  renderLaunches(records.slice(-count))
}

/**
 * launchShell — entry point for the interactive TTY shell.
 *
 * Called from src/bin/loopdesk.ts when the process is running in a TTY
 * and LOOPDESK_NO_TUI is not set.
 */
export function launchShell(opts: SupervisorRuntimeOptions = {}): void {
  let runtime: SupervisorRuntime
  try {
    runtime = buildSupervisorRuntime(opts)
  } catch (err) {
    process.stderr.write(`[loopdesk] ${errorMessage(err)}\n`)
    process.exitCode = 1
    return
  }

  const home = shortenHome(runtime.home, homedir())
  renderHeader(home, runtime.supervisor.kernelArgv)

  const ps1 = buildPS1(home)
  const rl  = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: 50,
  })
  rl.setPrompt(ps1)

  // Write the prompt directly rather than through rl.prompt(), so output
  // written between prompts does not desync readline's cursor tracking.
  const showPrompt = (): void => {
    process.stdout.write('\n' + ps1)
  }
  showPrompt()

  rl.on('line', (line: string) => {
    const input = line.trim()
    const [cmd = '', arg = ''] = input.split(/\s+/)

    if (input === '') {
      showPrompt()
      return
    }

    if (cmd === 'start') {
      runtime.api.startKernel()
        .then(reply => {
          renderReply(reply)
          showPrompt()
        })
        .catch((err: unknown) => {
          printError(err)
          showPrompt()
        })
      return
    }

    if (cmd === 'log') {
      try {
        showLog(runtime, arg)
      } catch (err) {
        printError(err)
      }
      showPrompt()
      return
    }

    if (cmd === 'help') {
      renderHelp()
      showPrompt()
      return
    }

    if (cmd === 'exit' || cmd === 'quit') {
      rl.close()
      return
    }

    printUnknown(input)
    showPrompt()
  })

  rl.on('SIGINT', () => {
    rl.close()
  })

  // Kernels were launched detached and unref'd; closing readline lets the
  // process exit without touching them.
  rl.on('close', () => {
    process.stdout.write('\n')
  })
}
