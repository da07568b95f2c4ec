import type { DeviceDescriptor } from '../device/types.js';

export enum HarnessErrorCode {
  TARGET_SETUP_ERROR = 'TARGET_SETUP_ERROR',
  DEVICE_NOT_AVAILABLE = 'DEVICE_NOT_AVAILABLE',
  CONFIG_ERROR = 'CONFIG_ERROR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  COMMAND_TIMEOUT = 'COMMAND_TIMEOUT',
  PLUGIN_NOT_FOUND = 'PLUGIN_NOT_FOUND',
}

// Why a setup failed, for the invoker's result reporting.
export type ErrorIdentifier =
  | 'INVOCATION_CANCELLED'
  | 'OPTION_CONFIGURATION_ERROR'
  | 'APK_INSTALLATION_FAILED';

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
  }
}

export class TargetSetupError extends HarnessError {
  readonly deviceDescriptor?: DeviceDescriptor;
  readonly identifier?: ErrorIdentifier;

  constructor(message: string, deviceDescriptor?: DeviceDescriptor, identifier?: ErrorIdentifier) {
    super(HarnessErrorCode.TARGET_SETUP_ERROR, message, {
      serial: deviceDescriptor?.serial,
      identifier,
    });
    this.name = 'TargetSetupError';
    this.deviceDescriptor = deviceDescriptor;
    this.identifier = identifier;
  }
}

export class DeviceNotAvailableError extends HarnessError {
  readonly serial: string;

  constructor(message: string, serial: string, cause?: unknown) {
    super(HarnessErrorCode.DEVICE_NOT_AVAILABLE, message, {
      serial,
      cause: cause === undefined ? undefined : describeError(cause),
    });
    this.name = 'DeviceNotAvailableError';
    this.serial = serial;
    this.cause = cause;
  }
}

export class CommandTimeoutError extends HarnessError {
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(HarnessErrorCode.COMMAND_TIMEOUT, `Command timed out after ${timeoutMs}ms: ${command}`, {
      command,
      timeoutMs,
    });
    this.name = 'CommandTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
