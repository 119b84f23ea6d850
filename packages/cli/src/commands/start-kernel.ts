/**
 * loopdesk start-kernel — Launch one kernel process
 *
 * Sends `start_kernel` through the host's command registry, prints the
 * reply, and exits 1 when the launch failed. The kernel keeps running
 * after this command returns.
 */

import { Command } from 'commander';
import { LaunchOutcome, outcomeOfReply } from '@loopdesk/supervisor';
import { buildSupervisorRuntime } from '@loopdesk/runtime-host';
import type { SupervisorRuntimeOptions } from '@loopdesk/runtime-host';
import { errorMessage } from './errors.js';

export interface StartKernelOptions {
  json?: boolean;
  home?: string;
  persistHome?: boolean;
}

/** Runtime pieces a caller may replace; the CLI itself never sets them. */
export type CliRuntimeOverrides = Pick<SupervisorRuntimeOptions, 'adapter' | 'launch'>;

export interface StartKernelReport {
  readonly text: string;
  readonly exitCode: number;
}

/** Render a `start_kernel` reply as CLI output and an exit code. */
export function renderStartKernel(reply: string, json: boolean): StartKernelReport {
  const outcome = outcomeOfReply(reply);
  return {
    text: json ? JSON.stringify({ reply, outcome }, null, 2) : reply,
    exitCode: outcome === LaunchOutcome.Spawned ? 0 : 1,
  };
}

export function createStartKernelCommand(overrides: CliRuntimeOverrides = {}): Command {
  return new Command('start-kernel')
    .description('Launch the kernel process in API mode and report the outcome')
    .option('--json', 'Output as JSON')
    .option('--home <dir>', 'Home directory for the launch log (overrides LOOPDESK_HOME)')
    .option('--persist-home', 'Remember --home for later runs')
    .action(async (options: StartKernelOptions) => {
      let reply: string;
      try {
        const runtime = buildSupervisorRuntime({
          ...overrides,
          home: options.home,
          persistHome: options.persistHome === true,
        });
        reply = await runtime.api.startKernel();
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`[loopdesk start-kernel] ${errorMessage(err)}`);
        process.exit(1);
      }

      const { text, exitCode } = renderStartKernel(reply, options.json === true);
      // eslint-disable-next-line no-console
      console.log(text);
      process.exitCode = exitCode;
    });
}
