// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * Thrown at supervisor construction when a launch spec field is empty.
 * A spawn failure is never reported this way; see LaunchOutcome.SpawnFailed.
 */
export class InvalidLaunchSpecError extends Error {
  constructor(field: string) {
    super(`Kernel launch spec field '${field}' must be a non-empty string.`);
    this.name = 'InvalidLaunchSpecError';
  }
}

/** Thrown when a command name is registered twice on the same registry. */
export class DuplicateCommandError extends Error {
  constructor(readonly command: string) {
    super(`Command '${command}' already has a handler.`);
    this.name = 'DuplicateCommandError';
  }
}

/** Rejection reason when a front end invokes a command nobody registered. */
export class UnknownCommandError extends Error {
  constructor(readonly command: string) {
    super(`No handler registered for command '${command}'.`);
    this.name = 'UnknownCommandError';
  }
}
