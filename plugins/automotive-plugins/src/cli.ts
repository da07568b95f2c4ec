/**
 * aaos-harness CLI
 *
 * @example
 * ```bash
 * aaos-harness list
 * aaos-harness run --config invocation.yaml
 * ```
 */

import { Command, CommanderError } from 'commander';
import type { PluginRegistry, RunInvocationOptions } from 'device-harness';
import { createListCommand, createRunCommand } from './commands/index.js';
import { EXIT_PASSED, EXIT_USAGE } from './commands/context.js';
import type { CliContext } from './commands/context.js';
import { createDefaultRegistry } from './register.js';

export { EXIT_FAILED, EXIT_PASSED, EXIT_USAGE } from './commands/context.js';

export interface CliDeps {
  registry?: PluginRegistry;
  invocation?: RunInvocationOptions;
  write?: (text: string) => void;
}

function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('aaos-harness')
    .description('Run device preparers and host tests against automotive Android targets');

  program.addCommand(createListCommand(ctx));
  program.addCommand(createRunCommand(ctx));

  // Added commands do not inherit these settings, so each gets its own.
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: ctx.write, writeErr: ctx.write });
  }
  return program;
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const ctx: CliContext = {
    registry: deps.registry ?? createDefaultRegistry(),
    invocation: deps.invocation,
    write: deps.write ?? ((text: string) => process.stdout.write(text)),
    exitCode: EXIT_PASSED,
  };

  try {
    await createProgram(ctx).parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already written its message; only explicit help or version exits cleanly.
      return err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? EXIT_PASSED : EXIT_USAGE;
    }
    throw err;
  }
  return ctx.exitCode;
}
