import type { KernelLaunchSpec } from '../types/launch.js';
import { DEFAULT_KERNEL_LAUNCH } from '../types/launch.js';
import { InvalidLaunchSpecError } from '../types/errors.js';

/** A resolved command line: the executable and the arguments after it. */
export interface KernelCommandLine {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
}

/**
 * Merge an override onto DEFAULT_KERNEL_LAUNCH and check every field.
 *
 * @throws {InvalidLaunchSpecError} If any resulting field is empty or blank
 */
export function resolveLaunchSpec(override?: Partial<KernelLaunchSpec>): KernelLaunchSpec {
  const spec: KernelLaunchSpec = { ...DEFAULT_KERNEL_LAUNCH, ...override };
  for (const field of ['interpreter', 'module', 'mode'] as const) {
    if (spec[field].trim() === '') {
      throw new InvalidLaunchSpecError(field);
    }
  }
  return Object.freeze(spec);
}

/** Argument vector for the kernel, interpreter first: `[interpreter, module, mode]`. */
export function buildKernelArgv(spec: KernelLaunchSpec): ReadonlyArray<string> {
  return [spec.interpreter, spec.module, spec.mode];
}

/** Split the argv into the executable the OS looks up and its arguments. */
export function toCommandLine(argv: ReadonlyArray<string>): KernelCommandLine {
  const [command, ...args] = argv;
  if (command === undefined) {
    throw new InvalidLaunchSpecError('interpreter');
  }
  return { command, args };
}
