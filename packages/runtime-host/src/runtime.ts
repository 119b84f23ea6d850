/**
 * Loopdesk Runtime Host — Runtime Assembly
 *
 * Builds the objects a host shell needs to expose `start_kernel`: the
 * supervisor with its Node spawn adapter and file-backed launch log, a
 * CommandRegistry with the supervisor's commands registered, and the
 * typed API a front end calls.
 *
 * Each call builds a fresh runtime. Nothing here is process-wide.
 */

import {
  CommandRegistry,
  KernelSupervisor,
  LaunchLogger,
  createShellApi,
  registerSupervisorCommands,
} from '@loopdesk/supervisor';
import type {
  KernelLaunchSpec,
  LoopdeskApi,
  SinkErrorHandler,
  SpawnAdapter,
} from '@loopdesk/supervisor';
import { NodeSpawnAdapter } from './adapters/spawn.js';
import { resolveLoopdeskHome } from './home.js';
import { FileStateIO } from './state/state-io.js';
import type { StateIO } from './state/state-io.js';
import { FileLaunchLogSink } from './logging/file-log-sink.js';

export interface SupervisorRuntimeOptions {
  /** Home directory override (the --home flag). */
  readonly home?: string | undefined;
  /** Remember `home` in the OS config file. */
  readonly persistHome?: boolean | undefined;
  /** Replaces NodeSpawnAdapter. */
  readonly adapter?: SpawnAdapter | undefined;
  /** Replaces the FileStateIO bound to `<home>`. */
  readonly stateIO?: StateIO | undefined;
  /** Launch spec override, fixed for the runtime's lifetime. */
  readonly launch?: Partial<KernelLaunchSpec> | undefined;
  /** Called when the launch log cannot be written. */
  readonly onLogError?: SinkErrorHandler | undefined;
}

export interface SupervisorRuntime {
  readonly home: string;
  readonly stateIO: StateIO;
  readonly supervisor: KernelSupervisor;
  readonly registry: CommandRegistry;
  readonly api: LoopdeskApi;
}

export function buildSupervisorRuntime(opts: SupervisorRuntimeOptions = {}): SupervisorRuntime {
  const home = resolveLoopdeskHome({ home: opts.home, persist: opts.persistHome });
  const stateIO = opts.stateIO ?? new FileStateIO(home);

  const logger = new LaunchLogger(new FileLaunchLogSink(stateIO), opts.onLogError);
  const supervisor = new KernelSupervisor(opts.adapter ?? new NodeSpawnAdapter(), {
    launch: opts.launch,
    logger,
  });

  const registry = new CommandRegistry();
  registerSupervisorCommands(registry, supervisor);

  return { home, stateIO, supervisor, registry, api: createShellApi(registry) };
}
