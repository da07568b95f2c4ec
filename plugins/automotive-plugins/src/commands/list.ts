/**
 * List command
 *
 * Prints every registered target preparer and test alias.
 */

import { Command } from 'commander';
import { EXIT_PASSED } from './context.js';
import type { CliContext } from './context.js';

export function createListCommand(ctx: CliContext): Command {
  return new Command('list').description('List registered target preparers and tests').action(() => {
    const aliases = ctx.registry.listAliases();
    ctx.write(`target preparers:\n${aliases.targetPreparers.map(a => `  ${a}`).join('\n')}\n`);
    ctx.write(`tests:\n${aliases.tests.map(a => `  ${a}`).join('\n')}\n`);
    ctx.exitCode = EXIT_PASSED;
  });
}
