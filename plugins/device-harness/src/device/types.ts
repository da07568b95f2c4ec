export type DeviceState = 'ONLINE' | 'FASTBOOT' | 'NOT_AVAILABLE';

export interface DeviceDescriptor {
  serial: string;
  state: DeviceState;
}

export type CommandStatus = 'SUCCESS' | 'FAILED' | 'TIMED_OUT';

export interface CommandResult {
  status: CommandStatus;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface InstallOptions {
  userId?: number;
  reinstall?: boolean;
  grantPermissions?: boolean;
  extraArgs?: string[];
}

/**
 * Handle on a single Android device, as seen by preparers and tests.
 * Every call is awaited in sequence; implementations keep no queue.
 */
export interface TestDevice {
  getSerialNumber(): string;
  getDeviceDescriptor(): DeviceDescriptor;

  /** Runs `adb shell` and returns stdout. */
  executeShellCommand(command: string): Promise<string>;
  /** Runs `adb shell` and returns the full result; never rejects on a non-zero exit. */
  executeShellV2Command(command: string): Promise<CommandResult>;
  executeFastbootCommand(...args: string[]): Promise<CommandResult>;

  createUser(name: string): Promise<number>;
  removeUser(userId: number): Promise<boolean>;
  startVisibleBackgroundUser(userId: number, displayId: number, waitFlag: boolean): Promise<boolean>;
  listDisplayIdsForStartingVisibleBackgroundUsers(): Promise<number[]>;

  isAdbRoot(): Promise<boolean>;
  enableAdbRoot(): Promise<boolean>;
  installPackage(apkPath: string, options?: InstallOptions): Promise<void>;

  reboot(): Promise<void>;
  rebootIntoBootloader(): Promise<void>;
  isStateBootloaderOrFastbootd(): Promise<boolean>;
}

export function toCommandResult(result: { exitCode: number; stdout: string; stderr: string; timedOut?: boolean }): CommandResult {
  let status: CommandStatus = 'SUCCESS';
  if (result.timedOut) {
    status = 'TIMED_OUT';
  } else if (result.exitCode !== 0) {
    status = 'FAILED';
  }
  return {
    status,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}
