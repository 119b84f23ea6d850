/**
 * @loopdesk/supervisor
 *
 * Kernel process supervisor: launch spec, argv construction, reply strings,
 * the KernelSupervisor itself, command dispatch and the launch logger.
 *
 * This package is side-effect free. It does not import node:fs,
 * node:child_process or node:net. Process creation and log persistence
 * are injected from @loopdesk/runtime-host.
 */

// Types
export type {
  KernelLaunchSpec,
  SpawnOutcome,
  SpawnedResult,
  SpawnFailedResult,
  LaunchResult,
} from './types/launch.js';
export { DEFAULT_KERNEL_LAUNCH, LaunchOutcome } from './types/launch.js';

export {
  InvalidLaunchSpecError,
  DuplicateCommandError,
  UnknownCommandError,
} from './types/errors.js';

// Adapter interface (implementation lives in runtime-host)
export type { SpawnAdapter } from './adapters/index.js';

// Launch command line and reply strings
export type { KernelCommandLine } from './launch/argv.js';
export { resolveLaunchSpec, buildKernelArgv, toCommandLine } from './launch/argv.js';
export { SPAWNED_REPLY, SPAWN_FAILED_PREFIX, formatLaunchReply, outcomeOfReply } from './launch/reply.js';

// Logging
export type { LaunchLogEntry, LaunchLogSink } from './logging/log-sink.js';
export type { SinkErrorHandler } from './logging/launch-log.js';
export { LaunchLogger } from './logging/launch-log.js';

// Supervisor
export type { KernelSupervisorOptions } from './supervisor.js';
export { KernelSupervisor } from './supervisor.js';

// Command dispatch
export type { CommandHandler } from './dispatch/command-registry.js';
export {
  CommandRegistry,
  START_KERNEL_COMMAND,
  registerSupervisorCommands,
} from './dispatch/command-registry.js';
export type { LoopdeskApi } from './dispatch/shell-api.js';
export { createShellApi } from './dispatch/shell-api.js';
