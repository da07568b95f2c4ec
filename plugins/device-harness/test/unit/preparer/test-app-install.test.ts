import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { TestAppInstallSetup } from '../../../src/preparer/test-app-install.js';
import { TestInformation } from '../../../src/invocation/test-information.js';
import { TargetSetupError } from '../../../src/shared/errors.js';
import { FakeTestDevice } from '../../../src/testing/fake-device.js';

describe('TestAppInstallSetup', () => {
  let tmpDir: string;
  let depsDir: string;
  let casesDir: string;
  let device: FakeTestDevice;
  let testInfo: TestInformation;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dh-install-'));
    depsDir = path.join(tmpDir, 'deps');
    casesDir = path.join(tmpDir, 'cases');
    await fs.mkdir(depsDir);
    await fs.mkdir(casesDir);
    device = new FakeTestDevice({ serial: 'emu-1' });
    testInfo = new TestInformation({ devices: [device], dependenciesFolder: depsDir, testcasesFolder: casesDir });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('starts with no files and enabled', () => {
    const preparer = TestAppInstallSetup.fromConfig();
    expect(preparer.getTestFileNames()).toEqual([]);
    expect(preparer.isDisabled()).toBe(false);
  });

  it('installs each file from the testcases folder with the configured options', async () => {
    await fs.writeFile(path.join(casesDir, 'Player.apk'), 'apk');
    await fs.writeFile(path.join(casesDir, 'Helper.apk'), 'apk');
    const preparer = TestAppInstallSetup.fromConfig({
      'test-file-name': ['Player.apk', 'Helper.apk'],
      'user-id': 11,
      'install-arg': ['-d'],
    });

    await preparer.setUp(testInfo);

    expect(device.installs).toEqual([
      {
        apkPath: path.join(casesDir, 'Player.apk'),
        options: { userId: 11, grantPermissions: true, extraArgs: ['-d'] },
      },
      {
        apkPath: path.join(casesDir, 'Helper.apk'),
        options: { userId: 11, grantPermissions: true, extraArgs: ['-d'] },
      },
    ]);
  });

  it('prefers the dependencies folder and accepts absolute paths', async () => {
    await fs.writeFile(path.join(depsDir, 'Player.apk'), 'apk');
    await fs.writeFile(path.join(casesDir, 'Player.apk'), 'apk');
    const absolute = path.join(tmpDir, 'Standalone.apk');
    await fs.writeFile(absolute, 'apk');
    const preparer = TestAppInstallSetup.fromConfig({ 'test-file-name': ['Player.apk', absolute] });

    await preparer.setUp(testInfo);

    expect(device.installs.map(i => i.apkPath)).toEqual([path.join(depsDir, 'Player.apk'), absolute]);
  });

  it('applies settings made through its setters', async () => {
    await fs.writeFile(path.join(casesDir, 'Player.apk'), 'apk');
    const preparer = TestAppInstallSetup.fromConfig();
    preparer.setUserId(12);
    preparer.setShouldGrantPermission(false);
    preparer.addTestFileName('Player.apk');
    preparer.addInstallArg('-r');

    await preparer.setUp(testInfo);

    expect(device.installs).toEqual([
      {
        apkPath: path.join(casesDir, 'Player.apk'),
        options: { userId: 12, grantPermissions: false, extraArgs: ['-r'] },
      },
    ]);
  });

  it('fails with an install error when the file cannot be found', async () => {
    const preparer = TestAppInstallSetup.fromConfig({ 'test-file-name': ['Missing.apk'] });

    const error = await preparer.setUp(testInfo).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TargetSetupError);
    expect(error).toMatchObject({
      message: 'Test APK not found: Missing.apk',
      identifier: 'APK_INSTALLATION_FAILED',
      deviceDescriptor: { serial: 'emu-1', state: 'ONLINE' },
    });
    expect(device.installs).toEqual([]);
  });
});
