import type { PluginRegistry, RunInvocationOptions } from 'device-harness';

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

/** Shared state for one CLI run; actions record their outcome in `exitCode`. */
export interface CliContext {
  registry: PluginRegistry;
  invocation?: RunInvocationOptions;
  write: (text: string) => void;
  exitCode: number;
}
