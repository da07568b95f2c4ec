import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AdbTestDevice } from '../device/adb-device.js';
import type { TestDevice } from '../device/types.js';
import type { InvocationConfig } from '../config/loader.js';
import type { PluginRegistry } from '../registry/plugin-registry.js';
import type { RemoteTest, TargetPreparer } from '../preparer/base.js';
import { describeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { LoggingInvocationListener } from './listener.js';
import type { TestInvocationListener } from './listener.js';
import { TestInformation } from './test-information.js';

const log = createLogger('invoker');

export type InvocationStatus = 'passed' | 'setup-failed' | 'failed';

export interface InvocationFailure {
  phase: 'setUp' | 'run' | 'tearDown';
  alias: string;
  message: string;
}

export interface InvocationResult {
  status: InvocationStatus;
  /** The setUp error that stopped the invocation, if any. */
  error?: unknown;
  failures: InvocationFailure[];
}

export type DeviceFactory = (serial: string, config: InvocationConfig) => TestDevice;

export interface RunInvocationOptions {
  deviceFactory?: DeviceFactory;
  /** Receives every run event in addition to the invoker's own logging. */
  listener?: TestInvocationListener;
}

export const adbDeviceFactory: DeviceFactory = (serial, config) =>
  new AdbTestDevice(serial, {
    adbPath: config.adbPath,
    fastbootPath: config.fastbootPath,
    commandTimeoutMs: config.commandTimeoutMs,
    bootTimeoutMs: config.bootTimeoutMs,
  });

interface DependenciesFolder {
  path: string;
  /** Created by the invoker; removed once the invocation ends. */
  temporary: boolean;
}

async function resolveDependenciesFolder(config: InvocationConfig): Promise<DependenciesFolder> {
  if (config.dependenciesDir) {
    await fs.mkdir(config.dependenciesDir, { recursive: true });
    return { path: config.dependenciesDir, temporary: false };
  }
  return { path: await fs.mkdtemp(path.join(os.tmpdir(), 'device-harness-')), temporary: true };
}

async function removeTemporaryFolder(folder: DependenciesFolder): Promise<void> {
  if (!folder.temporary) return;
  try {
    await fs.rm(folder.path, { recursive: true, force: true });
  } catch (err) {
    log.warn({ folder: folder.path, error: describeError(err) }, 'Could not remove temporary dependencies folder');
  }
}

/**
 * Runs one invocation: preparer setUp in order, tests, then tearDown in
 * reverse order for every preparer whose setUp was attempted.
 */
export async function runInvocation(
  config: InvocationConfig,
  registry: PluginRegistry,
  options: RunInvocationOptions = {}
): Promise<InvocationResult> {
  // An options error must abort before any device work.
  const preparers: TargetPreparer[] = config.targetPreparers.map(entry =>
    registry.createPreparer(entry.alias, entry.options)
  );
  const tests: RemoteTest[] = config.tests.map(entry => registry.createTest(entry.alias, entry.options));

  const deviceFactory = options.deviceFactory ?? adbDeviceFactory;
  const listener = new LoggingInvocationListener(options.listener);
  const devices = config.devices.map(d => deviceFactory(d.serial, config));
  const dependenciesFolder = await resolveDependenciesFolder(config);
  const testInfo = new TestInformation({
    devices,
    dependenciesFolder: dependenciesFolder.path,
    testcasesFolder: config.testcasesDir,
  });

  const failures: InvocationFailure[] = [];
  const attempted: TargetPreparer[] = [];
  let setupError: unknown;

  for (const preparer of preparers) {
    if (preparer.isDisabled()) {
      log.info({ preparer: preparer.alias }, 'Preparer disabled, skipping setUp');
      continue;
    }
    attempted.push(preparer);
    try {
      log.info({ preparer: preparer.alias }, 'Running setUp');
      await preparer.setUp(testInfo);
    } catch (err) {
      setupError = err;
      failures.push({ phase: 'setUp', alias: preparer.alias, message: describeError(err) });
      log.error({ preparer: preparer.alias, error: describeError(err) }, 'setUp failed');
      break;
    }
  }

  if (setupError === undefined) {
    for (const test of tests) {
      const startedAt = Date.now();
      listener.testRunStarted(test.alias);
      try {
        await test.run(testInfo, listener);
      } catch (err) {
        listener.testRunFailed(describeError(err));
      }
      listener.testRunEnded(Date.now() - startedAt);
    }
    for (const failure of listener.getFailures()) {
      failures.push({ phase: 'run', alias: failure.runName, message: failure.message });
    }
  } else {
    log.warn({ skipped: tests.map(t => t.alias) }, 'Skipping tests after setUp failure');
  }

  for (const preparer of [...attempted].reverse()) {
    if (preparer.isTearDownDisabled()) {
      log.info({ preparer: preparer.alias }, 'Tear down disabled, skipping');
      continue;
    }
    try {
      log.info({ preparer: preparer.alias }, 'Running tearDown');
      await preparer.tearDown(testInfo, setupError);
    } catch (err) {
      failures.push({ phase: 'tearDown', alias: preparer.alias, message: describeError(err) });
      log.error({ preparer: preparer.alias, error: describeError(err) }, 'tearDown failed');
    }
  }

  await removeTemporaryFolder(dependenciesFolder);

  let status: InvocationStatus = 'passed';
  if (setupError !== undefined) {
    status = 'setup-failed';
  } else if (failures.length > 0) {
    status = 'failed';
  }
  return { status, error: setupError, failures };
}
