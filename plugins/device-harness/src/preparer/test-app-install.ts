import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { BaseTargetPreparer } from './base.js';
import { baseOptionsFrom, baseTargetPreparerSchema, parseOptions } from '../config/options.js';
import type { BaseTargetPreparerOptions } from '../config/options.js';
import { TargetSetupError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { TestInformation } from '../invocation/test-information.js';
import type { TestDevice } from '../device/types.js';

const log = createLogger('test-app-install');

export const TEST_APP_INSTALL_ALIAS = 'test-app-install';

export const testAppInstallSchema = baseTargetPreparerSchema
  .extend({
    'test-file-name': z.array(z.string().min(1)).default(() => []),
    'user-id': z.number().int().nonnegative().optional(),
    'grant-permission': z.boolean().default(true),
    'install-arg': z.array(z.string()).default(() => []),
  })
  .transform(raw => ({
    ...baseOptionsFrom(raw),
    testFileNames: raw['test-file-name'],
    userId: raw['user-id'],
    grantPermission: raw['grant-permission'],
    installArgs: raw['install-arg'],
  }));

export interface TestAppInstallOptions extends BaseTargetPreparerOptions {
  testFileNames: string[];
  userId?: number;
  grantPermission: boolean;
  installArgs: string[];
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Installs test APKs on the primary device, optionally for a specific user. */
export class TestAppInstallSetup extends BaseTargetPreparer<TestAppInstallOptions> {
  readonly alias = TEST_APP_INSTALL_ALIAS;

  static fromConfig(raw: unknown = {}): TestAppInstallSetup {
    return new TestAppInstallSetup(parseOptions(TEST_APP_INSTALL_ALIAS, testAppInstallSchema, raw));
  }

  setUserId(userId: number): void {
    this.options.userId = userId;
  }

  setShouldGrantPermission(grant: boolean): void {
    this.options.grantPermission = grant;
  }

  addTestFileName(fileName: string): void {
    this.options.testFileNames.push(fileName);
  }

  addInstallArg(arg: string): void {
    this.options.installArgs.push(arg);
  }

  getTestFileNames(): readonly string[] {
    return this.options.testFileNames;
  }

  async setUp(testInfo: TestInformation): Promise<void> {
    const device = testInfo.device;
    for (const fileName of this.options.testFileNames) {
      const apkPath = await this.resolveTestFile(device, testInfo, fileName);
      log.debug(
        { serial: device.getSerialNumber(), apk: apkPath, userId: this.options.userId },
        'Installing test APK'
      );
      await device.installPackage(apkPath, {
        userId: this.options.userId,
        grantPermissions: this.options.grantPermission,
        extraArgs: this.options.installArgs,
      });
    }
  }

  private async resolveTestFile(device: TestDevice, testInfo: TestInformation, fileName: string): Promise<string> {
    if (path.isAbsolute(fileName)) {
      if (await exists(fileName)) return fileName;
    } else {
      for (const dir of [testInfo.dependenciesFolder, testInfo.testcasesFolder]) {
        const candidate = path.join(dir, fileName);
        if (await exists(candidate)) return candidate;
      }
    }
    throw new TargetSetupError(
      `Test APK not found: ${fileName}`,
      device.getDeviceDescriptor(),
      'APK_INSTALLATION_FAILED'
    );
  }
}
