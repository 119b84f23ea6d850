/**
 * @loopdesk/runtime-host
 *
 * Side-effectful implementations behind the @loopdesk/supervisor
 * interfaces: process creation, home-directory resolution and the launch
 * log. Nothing in @loopdesk/supervisor imports from this package.
 */

// Adapter implementations
export { NodeSpawnAdapter } from './adapters/spawn.js';

// LOOPDESK_HOME resolution
export type { ResolveLoopdeskHomeOptions } from './home.js';
export {
  resolveLoopdeskHome,
  getOsConfigPath,
  readLoopdeskHomeFromConfig,
  writeLoopdeskHomeToConfig,
} from './home.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Launch log
export { FileLaunchLogSink, LAUNCH_LOG_FILE } from './logging/file-log-sink.js';
export type { LaunchLogRecord, LaunchLogStats, LaunchLogReadResult } from './logging/log-reader.js';
export { readLaunchLog } from './logging/log-reader.js';
export { ulid } from './logging/ulid.js';

// Runtime assembly
export type { SupervisorRuntimeOptions, SupervisorRuntime } from './runtime.js';
export { buildSupervisorRuntime } from './runtime.js';
