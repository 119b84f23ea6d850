/**
 * Loopdesk Supervisor — Launch Types
 *
 * Defines the launch spec (what gets executed), the outcome reported by a
 * spawn adapter, and the Launch Result returned to the UI layer.
 *
 * A Launch Result is transient: it is built once per `start_kernel`
 * invocation, returned to the caller, and discarded. It never carries a
 * process handle. The supervisor does not own the child's lifetime.
 */

// ---------------------------------------------------------------------------
// Launch Spec
// ---------------------------------------------------------------------------

/**
 * The command line that starts the kernel.
 *
 * Fixed when the supervisor is constructed. Never supplied per call.
 * The argument vector is exactly `[interpreter, module, mode]`; the
 * interpreter is resolved on the inherited PATH by the host OS.
 */
export interface KernelLaunchSpec {
  /** Interpreter executable name or path (e.g. 'python3'). */
  readonly interpreter: string;
  /** Module entry point passed as the first argument (e.g. 'loop'). */
  readonly module: string;
  /** Mode flag passed as the second argument (e.g. 'serve'). */
  readonly mode: string;
}

/** The built-in launch command: `python3 loop serve`. */
export const DEFAULT_KERNEL_LAUNCH: KernelLaunchSpec = Object.freeze({
  interpreter: 'python3',
  module: 'loop',
  mode: 'serve',
});

// ---------------------------------------------------------------------------
// Spawn Outcome (adapter boundary)
// ---------------------------------------------------------------------------

/**
 * What a SpawnAdapter reports once process creation has returned.
 *
 * `pid` may be undefined on hosts that do not expose it; success is still
 * success.
 */
export type SpawnOutcome =
  | { readonly ok: true; readonly pid: number | undefined }
  | { readonly ok: false; readonly message: string; readonly code: string | undefined };

// ---------------------------------------------------------------------------
// Launch Result
// ---------------------------------------------------------------------------

/** The two variants of a Launch Result. */
export enum LaunchOutcome {
  /** Process creation succeeded. No handle is retained. */
  Spawned = 'Spawned',
  /** Process creation failed. Nothing was left running. */
  SpawnFailed = 'SpawnFailed',
}

export interface SpawnedResult {
  readonly outcome: LaunchOutcome.Spawned;
  /** Fixed confirmation message (see SPAWNED_REPLY). */
  readonly message: string;
}

export interface SpawnFailedResult {
  readonly outcome: LaunchOutcome.SpawnFailed;
  /** The operating system's description of the failure, verbatim. */
  readonly error: string;
  /** errno code reported by the host (ENOENT, EACCES, ...), when there is one. */
  readonly code: string | undefined;
}

/** Tagged outcome of one spawn attempt. */
export type LaunchResult = SpawnedResult | SpawnFailedResult;
