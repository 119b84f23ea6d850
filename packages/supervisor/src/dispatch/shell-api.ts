/**
 * Loopdesk Supervisor — Shell API
 *
 * The typed surface a front end is handed. Every method goes through
 * CommandRegistry.invoke(); nothing here calls the supervisor directly.
 */

import type { CommandRegistry } from './command-registry.js';
import { START_KERNEL_COMMAND } from './command-registry.js';

export interface LoopdeskApi {
  /**
   * Launch the kernel. Resolves with the reply string:
   * "Kernel Process Spawned (API Mode)" or "Failed to spawn kernel: …".
   */
  startKernel(): Promise<string>;

  /** Names of every command the host has registered. */
  commands(): ReadonlyArray<string>;
}

export function createShellApi(registry: CommandRegistry): LoopdeskApi {
  return {
    startKernel: async (): Promise<string> => {
      const reply = await registry.invoke(START_KERNEL_COMMAND);
      if (typeof reply !== 'string') {
        throw new TypeError(`${START_KERNEL_COMMAND} replied with ${typeof reply}, expected string`);
      }
      return reply;
    },

    commands: (): ReadonlyArray<string> => registry.list(),
  } satisfies LoopdeskApi;
}
