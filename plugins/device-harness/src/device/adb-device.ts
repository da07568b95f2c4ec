import { run as defaultRun, formatCommand } from '../shared/exec.js';
import type { CommandRunner, ExecResult } from '../shared/exec.js';
import { DeviceNotAvailableError, HarnessError, TargetSetupError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { toCommandResult } from './types.js';
import type { CommandResult, DeviceDescriptor, DeviceState, InstallOptions, TestDevice } from './types.js';

const log = createLogger('adb-device');

export interface AdbTestDeviceOptions {
  adbPath?: string;
  fastbootPath?: string;
  /** Per-command timeout for adb and fastboot invocations. */
  commandTimeoutMs?: number;
  /** Upper bound for a reboot or a transition into the bootloader. */
  bootTimeoutMs?: number;
  pollIntervalMs?: number;
  runner?: CommandRunner;
}

const CREATED_USER_PATTERN = /Success: created user id (\d+)/;

export function parseCreatedUserId(output: string): number | null {
  const match = output.match(CREATED_USER_PATTERN);
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

// `cmd activity list-displays-for-starting-users` prints e.g. "[2, 3]" or "none".
export function parseDisplayIds(output: string): number[] {
  const match = output.match(/\[([^\]]*)\]/);
  if (!match?.[1]) return [];
  return match[1]
    .split(',')
    .map(s => s.trim())
    .filter(s => /^\d+$/.test(s))
    .map(s => Number.parseInt(s, 10));
}

export function isSerialListed(fastbootDevicesOutput: string, serial: string): boolean {
  return fastbootDevicesOutput
    .split('\n')
    .some(line => line.trim().split(/\s+/)[0] === serial);
}

export class AdbTestDevice implements TestDevice {
  private readonly serial: string;
  private readonly adbPath: string;
  private readonly fastbootPath: string;
  private readonly commandTimeoutMs: number;
  private readonly bootTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly runner: CommandRunner;
  private state: DeviceState = 'ONLINE';

  constructor(serial: string, options: AdbTestDeviceOptions = {}) {
    this.serial = serial;
    this.adbPath = options.adbPath ?? 'adb';
    this.fastbootPath = options.fastbootPath ?? 'fastboot';
    this.commandTimeoutMs = options.commandTimeoutMs ?? 120_000;
    this.bootTimeoutMs = options.bootTimeoutMs ?? 300_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.runner = options.runner ?? defaultRun;
  }

  getSerialNumber(): string {
    return this.serial;
  }

  getDeviceDescriptor(): DeviceDescriptor {
    return { serial: this.serial, state: this.state };
  }

  async executeShellCommand(command: string): Promise<string> {
    const result = await this.executeShellV2Command(command);
    return result.stdout;
  }

  async executeShellV2Command(command: string): Promise<CommandResult> {
    const result = await this.adb(['shell', command]);
    return toCommandResult(result);
  }

  async executeFastbootCommand(...args: string[]): Promise<CommandResult> {
    const result = await this.fastboot(args);
    return toCommandResult(result);
  }

  async createUser(name: string): Promise<number> {
    const output = await this.executeShellCommand(`pm create-user ${name}`);
    const userId = parseCreatedUserId(output);
    if (userId === null) {
      throw new TargetSetupError(
        `Failed to create user ${name}: ${output.trim()}`,
        this.getDeviceDescriptor()
      );
    }
    return userId;
  }

  async removeUser(userId: number): Promise<boolean> {
    const output = await this.executeShellCommand(`pm remove-user ${userId}`);
    if (!output.includes('Success')) {
      log.warn({ serial: this.serial, userId, output: output.trim() }, 'Failed to remove user');
      return false;
    }
    return true;
  }

  async startVisibleBackgroundUser(userId: number, displayId: number, waitFlag: boolean): Promise<boolean> {
    const wait = waitFlag ? '-w ' : '';
    const output = await this.executeShellCommand(`am start-user ${wait}--display ${displayId} ${userId}`);
    return output.includes('Success');
  }

  async listDisplayIdsForStartingVisibleBackgroundUsers(): Promise<number[]> {
    const output = await this.executeShellCommand('cmd activity list-displays-for-starting-users');
    return parseDisplayIds(output);
  }

  async isAdbRoot(): Promise<boolean> {
    const output = await this.executeShellCommand('id');
    return output.includes('uid=0(');
  }

  async enableAdbRoot(): Promise<boolean> {
    if (await this.isAdbRoot()) return true;
    await this.adb(['root']);
    await this.waitForDevice();
    return this.isAdbRoot();
  }

  async installPackage(apkPath: string, options: InstallOptions = {}): Promise<void> {
    const args = ['install'];
    if (options.userId !== undefined) args.push('--user', String(options.userId));
    if (options.reinstall) args.push('-r');
    if (options.grantPermissions) args.push('-g');
    args.push(...(options.extraArgs ?? []), apkPath);

    const result = await this.adb(args);
    if (result.exitCode !== 0 || !result.stdout.includes('Success')) {
      throw new TargetSetupError(
        `Failed to install ${apkPath} on ${this.serial}: ${(result.stderr || result.stdout).trim()}`,
        this.getDeviceDescriptor(),
        'APK_INSTALLATION_FAILED'
      );
    }
  }

  async reboot(): Promise<void> {
    log.info({ serial: this.serial, from: this.state }, 'Rebooting device');
    this.checkRebootAccepted(
      this.state === 'FASTBOOT' ? await this.fastboot(['reboot']) : await this.adb(['reboot'])
    );
    this.state = 'NOT_AVAILABLE';
    await this.waitForDevice();
    await this.waitForBootComplete();
    this.state = 'ONLINE';
  }

  async rebootIntoBootloader(): Promise<void> {
    log.info({ serial: this.serial }, 'Rebooting device into bootloader');
    this.checkRebootAccepted(
      this.state === 'FASTBOOT' ? await this.fastboot(['reboot-bootloader']) : await this.adb(['reboot', 'bootloader'])
    );
    this.state = 'NOT_AVAILABLE';
    await this.poll('bootloader', () => this.isStateBootloaderOrFastbootd());
    this.state = 'FASTBOOT';
  }

  async isStateBootloaderOrFastbootd(): Promise<boolean> {
    const result = await this.runner(this.fastbootPath, ['devices'], { timeoutMs: this.commandTimeoutMs });
    return isSerialListed(result.stdout, this.serial);
  }

  private checkRebootAccepted(result: ExecResult): void {
    if (result.timedOut || result.exitCode !== 0) {
      const detail = (result.stderr || result.stdout).trim() || `exit code ${result.exitCode}`;
      throw new DeviceNotAvailableError(`Reboot command failed on ${this.serial}: ${detail}`, this.serial);
    }
  }

  private async waitForDevice(): Promise<void> {
    const result = await this.runner(this.adbPath, ['-s', this.serial, 'wait-for-device'], {
      timeoutMs: this.bootTimeoutMs,
    });
    if (result.timedOut || result.exitCode !== 0) {
      throw new DeviceNotAvailableError(
        `Device ${this.serial} did not come online within ${this.bootTimeoutMs}ms`,
        this.serial
      );
    }
  }

  private async waitForBootComplete(): Promise<void> {
    await this.poll('boot completion', async () => {
      const output = await this.executeShellCommand('getprop sys.boot_completed');
      return output.trim() === '1';
    });
  }

  private async poll(what: string, check: () => Promise<boolean>): Promise<void> {
    const deadline = Date.now() + this.bootTimeoutMs;
    for (;;) {
      if (await check()) return;
      if (Date.now() >= deadline) {
        throw new DeviceNotAvailableError(
          `Timed out after ${this.bootTimeoutMs}ms waiting for ${what} on ${this.serial}`,
          this.serial
        );
      }
      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
    }
  }

  private async adb(args: string[]): Promise<ExecResult> {
    return this.invoke(this.adbPath, ['-s', this.serial, ...args]);
  }

  private async fastboot(args: string[]): Promise<ExecResult> {
    return this.invoke(this.fastbootPath, ['-s', this.serial, ...args]);
  }

  private async invoke(command: string, args: string[]): Promise<ExecResult> {
    log.trace({ serial: this.serial, command: formatCommand(command, args) }, 'Executing device command');
    try {
      return await this.runner(command, args, { timeoutMs: this.commandTimeoutMs });
    } catch (err) {
      if (err instanceof HarnessError) {
        throw new DeviceNotAvailableError(`${command} could not reach ${this.serial}: ${err.message}`, this.serial, err);
      }
      throw err;
    }
  }
}
