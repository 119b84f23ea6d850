/**
 * Loopdesk Supervisor — Spawn Adapter Interface
 *
 * Process creation is a side effect, so the supervisor never touches
 * child_process itself. A concrete adapter is injected at construction;
 * the Node.js implementation lives in @loopdesk/runtime-host.
 */

import type { SpawnOutcome } from '../types/launch.js';

/**
 * Creates a detached child process and reports whether creation succeeded.
 *
 * Contract:
 * - The child inherits the caller's working directory and environment.
 * - No pipe, socket or IPC channel is opened to the child.
 * - The returned promise settles as soon as the host reports that process
 *   creation returned. It must not wait for output or exit.
 * - The adapter keeps no reference to the child after settling.
 * - Creation failures resolve to `{ ok: false }`; they are not thrown.
 */
export interface SpawnAdapter {
  spawnDetached(command: string, args: ReadonlyArray<string>): Promise<SpawnOutcome>;
}
