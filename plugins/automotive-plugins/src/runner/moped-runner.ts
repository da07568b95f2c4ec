import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  CommandTimeoutError,
  HarnessError,
  HarnessErrorCode,
  TargetSetupError,
  createLogger,
  describeError,
  parseOptions,
  run,
} from 'device-harness';
import type { CommandRunner, RemoteTest, TestInformation, TestInvocationListener } from 'device-harness';

const log = createLogger('moped-runner');

export const MOPED_ALIAS = 'aaos-moped-test';

export const mopedRunnerSchema = z
  .object({
    'test-artifact': z.string().min(1).optional(),
    'artifact': z.string().min(1).optional(),
    'unzip-build-timeout-min': z.number().int().positive().default(10),
    'test-timeout-min': z.number().int().positive().default(60),
  })
  .transform(raw => ({
    testArtifact: raw['test-artifact'],
    artifact: raw['artifact'],
    unzipBuildTimeoutMin: raw['unzip-build-timeout-min'],
    testTimeoutMin: raw['test-timeout-min'],
  }));

export interface MopedRunnerOptions {
  /** Path of the test artifact; used when `artifact` is not set. */
  testArtifact?: string;
  /** Artifact name, relative to the testcases folder. */
  artifact?: string;
  unzipBuildTimeoutMin: number;
  testTimeoutMin: number;
}

const MS_PER_MINUTE = 60_000;

class ArtifactNotFoundError extends HarnessError {
  constructor(message: string) {
    super(HarnessErrorCode.CONFIG_ERROR, message);
    this.name = 'ArtifactNotFoundError';
  }
}

const TARBALL_PATTERN = /\.tar.*gz/;

export function isTarballName(artifactFileName: string): boolean {
  return TARBALL_PATTERN.test(artifactFileName);
}

/** `moped.tar.gz` → `moped/`; names that are not tarballs are treated as directories. */
export function artifactDirectoryName(artifactFileName: string): string {
  return isTarballName(artifactFileName)
    ? artifactFileName.replace(TARBALL_PATTERN, '/')
    : `${artifactFileName}/`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Runs a packaged host-side test: unpacks the artifact into the
 * dependencies folder once, then runs its `run.sh` against every device.
 */
export class MopedRunner implements RemoteTest {
  readonly alias = MOPED_ALIAS;
  private readonly options: MopedRunnerOptions;
  private readonly runner: CommandRunner;

  constructor(options: MopedRunnerOptions, runner: CommandRunner = run) {
    this.options = options;
    this.runner = runner;
  }

  static fromConfig(raw: unknown = {}, runner?: CommandRunner): MopedRunner {
    return new MopedRunner(parseOptions(MOPED_ALIAS, mopedRunnerSchema, raw), runner);
  }

  async run(testInfo: TestInformation, listener: TestInvocationListener): Promise<void> {
    try {
      const artifactLocation = await this.unpackTestArtifact(testInfo);
      await this.executeHostCommand(
        ['bash', '-c', `bash ${artifactLocation}run.sh${this.getDevicesString(testInfo)}`],
        this.options.testTimeoutMin
      );
    } catch (err) {
      if (err instanceof ArtifactNotFoundError) {
        log.error(`Test artifact not found! ${err.message}`);
      } else if (err instanceof CommandTimeoutError) {
        log.error(`Test execution timeout! ${err.message}`);
      } else if (err instanceof HarnessError) {
        log.error(`There are problems running tests! ${err.message}`);
      } else {
        throw err;
      }
      listener.testRunFailed(describeError(err));
    }
  }

  /**
   * Returns the directory holding `run.sh`, with a trailing slash. Tarballs are
   * unpacked into the dependencies folder; a directory artifact runs in place.
   */
  async unpackTestArtifact(testInfo: TestInformation): Promise<string> {
    const artifact = this.options.artifact ?? this.options.testArtifact;
    if (!artifact) {
      throw new ArtifactNotFoundError('Neither artifact nor test-artifact is set');
    }

    const source = path.join(testInfo.testcasesFolder, artifact);
    const destination = testInfo.dependenciesFolder;
    const artifactLocation = `${destination}/${artifactDirectoryName(path.basename(source))}`;

    if (await exists(artifactLocation)) {
      return artifactLocation;
    }
    if (!isTarballName(path.basename(source))) {
      if (await isDirectory(source)) {
        return `${source}/`;
      }
      throw new ArtifactNotFoundError(`No artifact directory at ${source}`);
    }
    if (!(await exists(source))) {
      throw new ArtifactNotFoundError(`No artifact at ${source}`);
    }
    await this.executeHostCommand(
      ['bash', '-c', `tar xf ${source} -C ${destination}`],
      this.options.unzipBuildTimeoutMin
    );
    return artifactLocation;
  }

  private getDevicesString(testInfo: TestInformation): string {
    return testInfo.devices.map(device => ` ${device.getSerialNumber()}`).join('');
  }

  private async executeHostCommand(command: string[], timeoutMin: number): Promise<string[]> {
    const [executable, ...args] = command;
    if (!executable) {
      throw new TargetSetupError('Empty host command');
    }
    const printable = `[${command.join(', ')}]`;
    log.info(`Output of running ${printable} is:`);

    const timeoutMs = timeoutMin * MS_PER_MINUTE;
    const result = await this.runner(executable, args, { timeoutMs });
    if (result.timedOut) {
      throw new CommandTimeoutError(printable, timeoutMs);
    }

    const lines = result.stdout.split('\n').filter(line => line.length > 0);
    for (const line of lines) {
      log.info(line);
    }
    if (result.exitCode !== 0) {
      throw new TargetSetupError(`Execution of command ${printable} failed!`);
    }
    return lines;
  }
}
