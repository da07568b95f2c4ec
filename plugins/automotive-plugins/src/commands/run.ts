/**
 * Run command
 *
 * Loads an invocation file and runs its preparers and tests against the
 * configured devices.
 */

import { Command } from 'commander';
import {
  HarnessError,
  HarnessErrorCode,
  describeError,
  loadInvocationConfig,
  logger,
  runInvocation,
} from 'device-harness';
import { EXIT_FAILED, EXIT_PASSED, EXIT_USAGE } from './context.js';
import type { CliContext } from './context.js';

interface RunOptions {
  config: string;
}

// Bad config or an unknown alias is the caller's mistake, not a device failure.
function isUsageError(err: HarnessError): boolean {
  return err.code === HarnessErrorCode.CONFIG_ERROR || err.code === HarnessErrorCode.PLUGIN_NOT_FOUND;
}

async function runFromConfig(ctx: CliContext, configPath: string): Promise<number> {
  try {
    const config = await loadInvocationConfig(configPath);
    const result = await runInvocation(config, ctx.registry, ctx.invocation);
    for (const failure of result.failures) {
      ctx.write(`${failure.phase} ${failure.alias}: ${failure.message}\n`);
    }
    ctx.write(`Invocation ${result.status}\n`);
    return result.status === 'passed' ? EXIT_PASSED : EXIT_FAILED;
  } catch (err) {
    if (err instanceof HarnessError && isUsageError(err)) {
      ctx.write(`${err.message}\n`);
      return EXIT_USAGE;
    }
    logger.error({ error: describeError(err) }, 'Invocation aborted');
    ctx.write(`Invocation aborted: ${describeError(err)}\n`);
    return EXIT_FAILED;
  }
}

export function createRunCommand(ctx: CliContext): Command {
  return new Command('run')
    .description('Run an invocation described by a YAML file')
    .requiredOption('-c, --config <file>', 'Invocation config file')
    .action(async (options: RunOptions) => {
      ctx.exitCode = await runFromConfig(ctx, options.config);
    });
}
