/**
 * Loopdesk Supervisor — Command Dispatch
 *
 * The host shell's invocation surface. Handlers are registered by name and
 * invoked by name; each invocation yields exactly one reply. The front end
 * never reaches the supervisor directly, only through a registered command.
 *
 * Arguments and replies cross this boundary untyped, the same way they
 * cross an IPC channel: handlers validate what they receive and callers
 * narrow what they get back (see createShellApi).
 */

import type { KernelSupervisor } from '../supervisor.js';
import { formatLaunchReply } from '../launch/reply.js';
import { DuplicateCommandError, UnknownCommandError } from '../types/errors.js';

export type CommandHandler = (...args: unknown[]) => unknown;

/** Name under which the supervisor's launch operation is exposed. */
export const START_KERNEL_COMMAND = 'start_kernel';

export class CommandRegistry {
  private readonly handlers = new Map<string, CommandHandler>();

  /**
   * @throws {DuplicateCommandError} If `name` already has a handler
   */
  handle(name: string, handler: CommandHandler): void {
    if (this.handlers.has(name)) {
      throw new DuplicateCommandError(name);
    }
    this.handlers.set(name, handler);
  }

  /**
   * Run a registered command and resolve with its reply. Handlers may be
   * sync or async. Rejects with UnknownCommandError when nothing is
   * registered under `name`; a handler's own error rejects unchanged.
   */
  async invoke(name: string, ...args: unknown[]): Promise<unknown> {
    const handler = this.handlers.get(name);
    if (handler === undefined) {
      throw new UnknownCommandError(name);
    }
    return await handler(...args);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  /** Registered command names, sorted. */
  list(): ReadonlyArray<string> {
    return [...this.handlers.keys()].sort();
  }
}

/**
 * Register the supervisor's commands.
 *
 * `start_kernel` takes no arguments (any passed are ignored); its reply is
 * the single status string from formatLaunchReply.
 */
export function registerSupervisorCommands(registry: CommandRegistry, supervisor: KernelSupervisor): void {
  registry.handle(START_KERNEL_COMMAND, async (): Promise<string> => {
    const result = await supervisor.startKernel();
    return formatLaunchReply(result);
  });
}
