/**
 * Loopdesk Supervisor — Kernel Process Supervisor
 *
 * Turns a parameterless UI request into one kernel process launch and
 * reports the outcome.
 *
 * Resource policy is fire-and-forget: on success exactly one child exists
 * and the supervisor holds nothing that refers to it. There is no wait, no
 * reap, no restart and no teardown when the host exits. Every invocation is
 * independent; N successful calls leave N kernel processes running.
 *
 * Errors from process creation are returned as LaunchOutcome.SpawnFailed.
 * startKernel() does not reject.
 */

import type { SpawnAdapter } from './adapters/index.js';
import type { KernelLaunchSpec, LaunchResult, SpawnOutcome } from './types/launch.js';
import { LaunchOutcome } from './types/launch.js';
import { buildKernelArgv, resolveLaunchSpec, toCommandLine } from './launch/argv.js';
import { SPAWNED_REPLY, formatLaunchReply } from './launch/reply.js';
import { LaunchLogger } from './logging/launch-log.js';

export interface KernelSupervisorOptions {
  /**
   * Replaces fields of DEFAULT_KERNEL_LAUNCH. Fixed for the lifetime of the
   * supervisor; no call can change it.
   */
  readonly launch?: Partial<KernelLaunchSpec> | undefined;
  /** Receives one entry per invocation. Defaults to a logger with no sink. */
  readonly logger?: LaunchLogger | undefined;
  /** Injectable clock for log timestamps. */
  readonly now?: (() => Date) | undefined;
}

export class KernelSupervisor {
  private readonly spec: KernelLaunchSpec;
  private readonly argv: ReadonlyArray<string>;
  private readonly logger: LaunchLogger;
  private readonly now: () => Date;

  /**
   * @throws {InvalidLaunchSpecError} If the resolved launch spec has an empty field
   */
  constructor(
    private readonly adapter: SpawnAdapter,
    options: KernelSupervisorOptions = {},
  ) {
    this.spec = resolveLaunchSpec(options.launch);
    this.argv = Object.freeze(buildKernelArgv(this.spec));
    this.logger = options.logger ?? new LaunchLogger();
    this.now = options.now ?? (() => new Date());
  }

  /** The launch spec this supervisor was built with. */
  get launchSpec(): KernelLaunchSpec {
    return this.spec;
  }

  /** The argument vector every launch uses, interpreter first. */
  get kernelArgv(): ReadonlyArray<string> {
    return this.argv;
  }

  /**
   * Launch one kernel process.
   *
   * Settles when process creation returns, never later. The child's first
   * output, readiness and exit are not observed.
   */
  async startKernel(): Promise<LaunchResult> {
    const { command, args } = toCommandLine(this.argv);

    let spawned: SpawnOutcome;
    try {
      spawned = await this.adapter.spawnDetached(command, args);
    } catch (err: unknown) {
      // An adapter that throws instead of resolving is still a spawn failure.
      spawned = {
        ok: false,
        message: err instanceof Error ? err.message : String(err),
        code: errnoCode(err),
      };
    }

    const result: LaunchResult = spawned.ok
      ? { outcome: LaunchOutcome.Spawned, message: SPAWNED_REPLY }
      : { outcome: LaunchOutcome.SpawnFailed, error: spawned.message, code: spawned.code };

    this.logger.record({
      timestamp: this.now().toISOString(),
      outcome: result.outcome,
      argv: this.argv,
      pid: spawned.ok ? spawned.pid ?? null : null,
      error: result.outcome === LaunchOutcome.SpawnFailed ? result.error : null,
      code: result.outcome === LaunchOutcome.SpawnFailed ? result.code ?? null : null,
      reply: formatLaunchReply(result),
    });

    return result;
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
