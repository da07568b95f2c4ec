import {
  AdbTestDevice,
  isSerialListed,
  parseCreatedUserId,
  parseDisplayIds,
} from '../../../src/device/adb-device.js';
import { DeviceNotAvailableError, HarnessError, HarnessErrorCode, TargetSetupError } from '../../../src/shared/errors.js';
import type { CommandRunner, ExecOptions, ExecResult } from '../../../src/shared/exec.js';

const SERIAL = 'emu-5554';

interface RecordedCall {
  line: string;
  options?: ExecOptions;
}

function scriptedRunner(respond: (line: string) => Partial<ExecResult> = () => ({})) {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    const line = [command, ...args].join(' ');
    calls.push({ line, options });
    return { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...respond(line) };
  };
  return { runner, calls, lines: () => calls.map(c => c.line) };
}

describe('output parsers', () => {
  it('parses the id of a created user', () => {
    expect(parseCreatedUserId('Success: created user id 11\n')).toBe(11);
    expect(parseCreatedUserId('Error: couldn\'t create User.')).toBeNull();
  });

  it('parses the display list', () => {
    expect(parseDisplayIds('[2, 3]\n')).toEqual([2, 3]);
    expect(parseDisplayIds('[]')).toEqual([]);
    expect(parseDisplayIds('none')).toEqual([]);
  });

  it('matches the serial column of fastboot devices', () => {
    expect(isSerialListed(`${SERIAL}\tfastboot\n`, SERIAL)).toBe(true);
    expect(isSerialListed(`${SERIAL}0\tfastboot\n`, SERIAL)).toBe(false);
    expect(isSerialListed('', SERIAL)).toBe(false);
  });
});

describe('AdbTestDevice', () => {
  it('runs shell commands against its serial with the command timeout', async () => {
    const { runner, calls } = scriptedRunner(() => ({ stdout: '33\n' }));
    const device = new AdbTestDevice(SERIAL, { runner, commandTimeoutMs: 5000 });

    const result = await device.executeShellV2Command('getprop ro.build.version.sdk');

    expect(result).toEqual({ status: 'SUCCESS', exitCode: 0, stdout: '33\n', stderr: '' });
    expect(calls).toEqual([
      { line: `adb -s ${SERIAL} shell getprop ro.build.version.sdk`, options: { timeoutMs: 5000 } },
    ]);
  });

  it('reports failed and timed out shell commands without throwing', async () => {
    const { runner } = scriptedRunner(line =>
      line.endsWith('slow') ? { exitCode: 128, timedOut: true } : { exitCode: 1, stderr: 'nope' }
    );
    const device = new AdbTestDevice(SERIAL, { runner });

    expect((await device.executeShellV2Command('false')).status).toBe('FAILED');
    expect((await device.executeShellV2Command('slow')).status).toBe('TIMED_OUT');
  });

  it('uses the configured tool paths', async () => {
    const { runner, lines } = scriptedRunner();
    const device = new AdbTestDevice(SERIAL, { runner, adbPath: '/sdk/adb', fastbootPath: '/sdk/fastboot' });

    await device.executeShellCommand('id');
    await device.executeFastbootCommand('oem', 'device-info');

    expect(lines()).toEqual([`/sdk/adb -s ${SERIAL} shell id`, `/sdk/fastboot -s ${SERIAL} oem device-info`]);
  });

  it('creates a user and returns its id', async () => {
    const { runner, lines } = scriptedRunner(() => ({ stdout: 'Success: created user id 12\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    await expect(device.createUser('user-display-2')).resolves.toBe(12);
    expect(lines()).toEqual([`adb -s ${SERIAL} shell pm create-user user-display-2`]);
  });

  it('throws TargetSetupError when user creation fails', async () => {
    const { runner } = scriptedRunner(() => ({ stdout: 'Error: max users reached\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    await expect(device.createUser('user-display-2')).rejects.toThrow(
      new TargetSetupError('Failed to create user user-display-2: Error: max users reached')
    );
  });

  it('starts a visible background user on a display', async () => {
    const { runner, lines } = scriptedRunner(() => ({ stdout: 'Success: user started on display 2\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    await expect(device.startVisibleBackgroundUser(12, 2, true)).resolves.toBe(true);
    expect(lines()).toEqual([`adb -s ${SERIAL} shell am start-user -w --display 2 12`]);
  });

  it('reports whether a user was removed', async () => {
    const { runner } = scriptedRunner(line => ({ stdout: line.endsWith('12') ? 'Success: removed user\n' : 'Error\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    await expect(device.removeUser(12)).resolves.toBe(true);
    await expect(device.removeUser(13)).resolves.toBe(false);
  });

  it('lists the displays available for passenger users', async () => {
    const { runner, lines } = scriptedRunner(() => ({ stdout: '[2, 3]\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    await expect(device.listDisplayIdsForStartingVisibleBackgroundUsers()).resolves.toEqual([2, 3]);
    expect(lines()).toEqual([`adb -s ${SERIAL} shell cmd activity list-displays-for-starting-users`]);
  });

  it('restarts adbd as root when needed', async () => {
    let rooted = false;
    const { runner, lines } = scriptedRunner(line => {
      if (line.endsWith(' root')) rooted = true;
      if (line.endsWith('shell id')) {
        return { stdout: rooted ? 'uid=0(root) gid=0(root)\n' : 'uid=2000(shell) gid=2000(shell)\n' };
      }
      return {};
    });
    const device = new AdbTestDevice(SERIAL, { runner });

    await expect(device.enableAdbRoot()).resolves.toBe(true);
    expect(lines()).toEqual([
      `adb -s ${SERIAL} shell id`,
      `adb -s ${SERIAL} root`,
      `adb -s ${SERIAL} wait-for-device`,
      `adb -s ${SERIAL} shell id`,
    ]);
  });

  it('installs a package with user, permission and extra args', async () => {
    const { runner, lines } = scriptedRunner(() => ({ stdout: 'Performing Streamed Install\nSuccess\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    await device.installPackage('/tmp/app.apk', {
      userId: 11,
      reinstall: true,
      grantPermissions: true,
      extraArgs: ['-d'],
    });

    expect(lines()).toEqual([`adb -s ${SERIAL} install --user 11 -r -g -d /tmp/app.apk`]);
  });

  it('throws an install failure when adb does not report success', async () => {
    const { runner } = scriptedRunner(() => ({ exitCode: 1, stderr: 'INSTALL_FAILED_INSUFFICIENT_STORAGE\n' }));
    const device = new AdbTestDevice(SERIAL, { runner });

    const error = await device.installPackage('/tmp/app.apk').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TargetSetupError);
    expect(error).toMatchObject({
      identifier: 'APK_INSTALLATION_FAILED',
      message: `Failed to install /tmp/app.apk on ${SERIAL}: INSTALL_FAILED_INSUFFICIENT_STORAGE`,
    });
  });

  it('reboots and waits for boot completion', async () => {
    const { runner, calls, lines } = scriptedRunner(line =>
      line.endsWith('getprop sys.boot_completed') ? { stdout: '1\n' } : {}
    );
    const device = new AdbTestDevice(SERIAL, { runner, bootTimeoutMs: 9000, pollIntervalMs: 1 });

    await device.reboot();

    expect(lines()).toEqual([
      `adb -s ${SERIAL} reboot`,
      `adb -s ${SERIAL} wait-for-device`,
      `adb -s ${SERIAL} shell getprop sys.boot_completed`,
    ]);
    expect(calls[1]?.options).toEqual({ timeoutMs: 9000 });
    expect(device.getDeviceDescriptor()).toEqual({ serial: SERIAL, state: 'ONLINE' });
  });

  it('polls fastboot until the device shows up in the bootloader', async () => {
    let polls = 0;
    const { runner, lines } = scriptedRunner(line => {
      if (line === 'fastboot devices') {
        polls += 1;
        return { stdout: polls >= 2 ? `${SERIAL}\tfastboot\n` : '' };
      }
      if (line.endsWith('getprop sys.boot_completed')) return { stdout: '1\n' };
      return {};
    });
    const device = new AdbTestDevice(SERIAL, { runner, pollIntervalMs: 1 });

    await device.rebootIntoBootloader();
    expect(device.getDeviceDescriptor().state).toBe('FASTBOOT');
    await device.reboot();

    expect(lines()).toEqual([
      `adb -s ${SERIAL} reboot bootloader`,
      'fastboot devices',
      'fastboot devices',
      `fastboot -s ${SERIAL} reboot`,
      `adb -s ${SERIAL} wait-for-device`,
      `adb -s ${SERIAL} shell getprop sys.boot_completed`,
    ]);
  });

  it('gives up waiting for the bootloader after the boot timeout', async () => {
    const { runner } = scriptedRunner();
    const device = new AdbTestDevice(SERIAL, { runner, bootTimeoutMs: 5, pollIntervalMs: 1 });

    await expect(device.rebootIntoBootloader()).rejects.toThrow(
      new DeviceNotAvailableError(`Timed out after 5ms waiting for bootloader on ${SERIAL}`, SERIAL)
    );
  });

  it('throws DeviceNotAvailableError when the device never comes back', async () => {
    const { runner } = scriptedRunner(line => (line.endsWith('wait-for-device') ? { exitCode: 1 } : {}));
    const device = new AdbTestDevice(SERIAL, { runner, bootTimeoutMs: 1000 });

    await expect(device.reboot()).rejects.toBeInstanceOf(DeviceNotAvailableError);
  });

  it('fails a rejected reboot without waiting for the device', async () => {
    const { runner, lines } = scriptedRunner(line =>
      line.endsWith(' reboot') ? { exitCode: 1, stderr: 'error: device unauthorized.\n' } : {}
    );
    const device = new AdbTestDevice(SERIAL, { runner, bootTimeoutMs: 300_000 });

    await expect(device.reboot()).rejects.toThrow(
      new DeviceNotAvailableError(`Reboot command failed on ${SERIAL}: error: device unauthorized.`, SERIAL)
    );
    expect(lines()).toEqual([`adb -s ${SERIAL} reboot`]);
    expect(device.getDeviceDescriptor().state).toBe('ONLINE');
  });

  it('fails a rejected bootloader reboot without polling fastboot', async () => {
    const { runner, lines } = scriptedRunner(line => (line.endsWith('reboot bootloader') ? { exitCode: 1 } : {}));
    const device = new AdbTestDevice(SERIAL, { runner, bootTimeoutMs: 300_000 });

    await expect(device.rebootIntoBootloader()).rejects.toThrow(
      new DeviceNotAvailableError(`Reboot command failed on ${SERIAL}: exit code 1`, SERIAL)
    );
    expect(lines()).toEqual([`adb -s ${SERIAL} reboot bootloader`]);
  });

  it('wraps a runner failure as DeviceNotAvailableError', async () => {
    const runner: CommandRunner = async command => {
      throw new HarnessError(HarnessErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`);
    };
    const device = new AdbTestDevice(SERIAL, { runner });

    const error = await device.executeShellCommand('id').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceNotAvailableError);
    expect(error).toMatchObject({
      serial: SERIAL,
      message: `adb could not reach ${SERIAL}: Command failed to spawn: adb`,
    });
  });
});
