import execa from 'execa';
import { CommandTimeoutError, HarnessError, HarnessErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
  timedOut: boolean;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

// Signature shared by run() and the scripted runners used in tests.
export type CommandRunner = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

export async function run(
  command: string,
  args: string[],
  options?: ExecOptions
): Promise<ExecResult> {
  try {
    // execa sends SIGTERM once the timeout elapses and reports timedOut.
    const result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      reject: false,
    });
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.exitCode ?? (result.signal ? 128 : result.failed ? 127 : 0),
      signal: result.signal ?? undefined,
      timedOut: result.timedOut,
    };
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function runOrThrow(
  command: string,
  args: string[],
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.timedOut) {
    throw new CommandTimeoutError(formatCommand(command, args), options?.timeoutMs ?? 0);
  }
  if (result.exitCode !== 0) {
    throw new HarnessError(
      HarnessErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${formatCommand(command, args)}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
      }
    );
  }
  return result;
}
