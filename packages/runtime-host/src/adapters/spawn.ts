/**
 * Loopdesk Runtime Host — Detached Spawn Adapter
 *
 * Implements the SpawnAdapter interface from @loopdesk/supervisor with
 * node:child_process.spawn.
 *
 * The child is created:
 *   - with the parent's cwd and environment (neither option is passed)
 *   - with stdio 'ignore', so no pipe connects parent and child
 *   - detached and unref()'d, so the host's event loop never waits on it
 *
 * Node reports the result of process creation through the 'spawn' and
 * 'error' events. The promise settles on whichever fires first; a missing
 * binary (ENOENT) or denied exec (EACCES) arrives as 'error'. After it
 * settles the adapter drops every reference to the child.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { SpawnAdapter, SpawnOutcome } from '@loopdesk/supervisor';

export class NodeSpawnAdapter implements SpawnAdapter {
  spawnDetached(command: string, args: ReadonlyArray<string>): Promise<SpawnOutcome> {
    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(command, [...args], {
          detached: true,
          stdio: 'ignore',
          windowsHide: true,
        });
      } catch (err: unknown) {
        // Argument validation errors are thrown synchronously rather than emitted.
        resolve(toFailure(err));
        return;
      }

      const onSpawn = (): void => {
        child.off('error', onError);
        const pid = child.pid;
        child.unref();
        resolve({ ok: true, pid });
      };

      const onError = (err: Error): void => {
        child.off('spawn', onSpawn);
        resolve(toFailure(err));
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}

function toFailure(err: unknown): SpawnOutcome {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { ok: false, message: err.message, code };
  }
  return { ok: false, message: String(err), code: undefined };
}
