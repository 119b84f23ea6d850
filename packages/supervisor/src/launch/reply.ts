/**
 * Reply strings returned by `start_kernel`.
 *
 * Callers pattern-match on these, so the text is part of the contract:
 *   success  →  "Kernel Process Spawned (API Mode)"
 *   failure  →  "Failed to spawn kernel: <os error message>"
 */

import { LaunchOutcome } from '../types/launch.js';
import type { LaunchResult } from '../types/launch.js';

export const SPAWNED_REPLY = 'Kernel Process Spawned (API Mode)';

export const SPAWN_FAILED_PREFIX = 'Failed to spawn kernel: ';

export function formatLaunchReply(result: LaunchResult): string {
  switch (result.outcome) {
    case LaunchOutcome.Spawned:
      return result.message;
    case LaunchOutcome.SpawnFailed:
      return SPAWN_FAILED_PREFIX + result.error;
  }
}

/**
 * Recover the outcome from a reply string, for callers that only receive
 * the text (the shell API, the CLI).
 */
export function outcomeOfReply(reply: string): LaunchOutcome {
  return reply.startsWith(SPAWN_FAILED_PREFIX) ? LaunchOutcome.SpawnFailed : LaunchOutcome.Spawned;
}
