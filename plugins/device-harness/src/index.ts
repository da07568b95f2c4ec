export {
  HarnessError,
  HarnessErrorCode,
  TargetSetupError,
  DeviceNotAvailableError,
  CommandTimeoutError,
  describeError,
} from './shared/errors.js';
export type { ErrorIdentifier } from './shared/errors.js';
export { run, runOrThrow, formatCommand } from './shared/exec.js';
export type { CommandRunner, ExecOptions, ExecResult } from './shared/exec.js';
export { logger, createLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';

export { toCommandResult } from './device/types.js';
export type {
  CommandResult,
  CommandStatus,
  DeviceDescriptor,
  DeviceState,
  InstallOptions,
  TestDevice,
} from './device/types.js';
export { AdbTestDevice, parseCreatedUserId, parseDisplayIds, isSerialListed } from './device/adb-device.js';
export type { AdbTestDeviceOptions } from './device/adb-device.js';

export { TestInformation } from './invocation/test-information.js';
export type { TestInformationInit } from './invocation/test-information.js';
export { LoggingInvocationListener } from './invocation/listener.js';
export type { TestInvocationListener, RunFailure } from './invocation/listener.js';
export { runInvocation, adbDeviceFactory } from './invocation/invoker.js';
export type {
  DeviceFactory,
  InvocationFailure,
  InvocationResult,
  InvocationStatus,
  RunInvocationOptions,
} from './invocation/invoker.js';

export { BaseTargetPreparer } from './preparer/base.js';
export type { RemoteTest, TargetPreparer } from './preparer/base.js';
export {
  TestAppInstallSetup,
  TEST_APP_INSTALL_ALIAS,
  testAppInstallSchema,
} from './preparer/test-app-install.js';
export type { TestAppInstallOptions } from './preparer/test-app-install.js';

export { baseTargetPreparerSchema, baseOptionsFrom, parseOptions, formatIssues } from './config/options.js';
export type { BaseTargetPreparerOptions } from './config/options.js';
export { loadInvocationConfig, parseInvocationConfig } from './config/loader.js';
export type { InvocationConfig, PluginEntry } from './config/loader.js';

export { PluginRegistry, registerBuiltins } from './registry/plugin-registry.js';
export type { PluginAliases, PreparerFactory, TestFactory } from './registry/plugin-registry.js';
