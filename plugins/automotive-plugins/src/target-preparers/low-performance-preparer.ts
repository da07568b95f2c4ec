import { z } from 'zod';
import {
  BaseTargetPreparer,
  DeviceNotAvailableError,
  TargetSetupError,
  baseOptionsFrom,
  baseTargetPreparerSchema,
  createLogger,
  parseOptions,
} from 'device-harness';
import type { BaseTargetPreparerOptions, CommandResult, TestDevice, TestInformation } from 'device-harness';

const log = createLogger('low-performance');

export const LOW_PERFORMANCE_ALIAS = 'low-performance';

export const lowPerformanceSchema = baseTargetPreparerSchema
  .extend({
    'nr-cpus': z.union([z.string().min(1), z.number().int().positive()]).default('4'),
    'mem': z.union([z.string().min(1), z.number().int().positive()]).default('4'),
  })
  .transform(raw => ({
    ...baseOptionsFrom(raw),
    nrCpus: String(raw['nr-cpus']),
    mem: String(raw['mem']),
  }));

export interface LowPerformanceOptions extends BaseTargetPreparerOptions {
  /** Number of CPU cores to limit the device to. */
  nrCpus: string;
  /** Memory limit in GB. */
  mem: string;
}

/** CPU and memory limits as reported by `fastboot oem device-info`. */
export interface OemDeviceInfo {
  nrCpus: string;
  mem: string;
}

export function sameDeviceInfo(a: OemDeviceInfo, b: OemDeviceInfo): boolean {
  return a.nrCpus === b.nrCpus && a.mem === b.mem;
}

/**
 * Parses the bootloader's device-info lines, e.g.
 *   (bootloader) Nr cpus: 4
 *   (bootloader) Mem Size: 4G
 * Missing values come back as empty strings.
 */
export function parseOemDeviceInfo(output: string): OemDeviceInfo {
  let nrCpus = '';
  let mem = '';
  for (const line of output.split('\n')) {
    const parts = line.trimEnd().split(': ');
    if (parts.length !== 2) continue;
    const [key, value] = parts;
    if (key === '(bootloader) Nr cpus') {
      nrCpus = value ?? '';
    }
    if (key === '(bootloader) Mem Size') {
      mem = (value ?? '').replace(/\D/g, '');
    }
  }
  return { nrCpus, mem };
}

/** Puts the device into a low performance state for the test duration. */
export class LowPerformanceTargetPreparer extends BaseTargetPreparer<LowPerformanceOptions> {
  readonly alias = LOW_PERFORMANCE_ALIAS;

  private initialDeviceInfo: OemDeviceInfo | null = null;

  static fromConfig(raw: unknown = {}): LowPerformanceTargetPreparer {
    return new LowPerformanceTargetPreparer(parseOptions(LOW_PERFORMANCE_ALIAS, lowPerformanceSchema, raw));
  }

  private get lowPerformanceDeviceInfo(): OemDeviceInfo {
    return { nrCpus: this.options.nrCpus, mem: this.options.mem };
  }

  getInitialDeviceInfo(): OemDeviceInfo | null {
    return this.initialDeviceInfo;
  }

  async setUp(testInfo: TestInformation): Promise<void> {
    const device = testInfo.device;
    const target = this.lowPerformanceDeviceInfo;
    await device.rebootIntoBootloader();
    try {
      this.initialDeviceInfo = await this.getOemDeviceInfo(device);
      await this.executeFastbootCommand(device, `oem nr-cpus ${target.nrCpus}`);
      await this.executeFastbootCommand(device, `oem mem ${target.mem}`);
      if (!(await this.isDeviceInLowPerformanceState(device))) {
        throw new TargetSetupError(
          'Device is not in a low performance state after setUp.',
          device.getDeviceDescriptor(),
          'INVOCATION_CANCELLED'
        );
      }
    } finally {
      await device.reboot();
    }
  }

  async tearDown(testInfo: TestInformation): Promise<void> {
    const initial = this.initialDeviceInfo;
    if (!initial) {
      log.warn('Initial device info was never captured; nothing to restore');
      return;
    }

    const device = testInfo.device;
    await device.rebootIntoBootloader();
    try {
      await this.executeFastbootCommand(device, `oem mem ${initial.mem}`);
      await this.executeFastbootCommand(device, `oem nr-cpus ${initial.nrCpus}`);
      // A device that started at the target limits cannot tell restored from not restored.
      if (
        !sameDeviceInfo(initial, this.lowPerformanceDeviceInfo) &&
        (await this.isDeviceInLowPerformanceState(device))
      ) {
        throw new TargetSetupError('Failed to reset device to the initial state.', device.getDeviceDescriptor());
      }
    } catch (err) {
      if (err instanceof TargetSetupError) {
        log.error({ serial: device.getSerialNumber(), error: err.message }, 'Failed to restore device performance');
        throw new DeviceNotAvailableError(
          'Failed to reset device to the initial state.',
          device.getSerialNumber(),
          err
        );
      }
      throw err;
    } finally {
      await device.reboot();
    }
  }

  private async executeFastbootCommand(device: TestDevice, command: string): Promise<CommandResult> {
    if (!(await device.isStateBootloaderOrFastbootd())) {
      throw new TargetSetupError(
        'Device is not in fastboot mode',
        device.getDeviceDescriptor(),
        'OPTION_CONFIGURATION_ERROR'
      );
    }
    log.trace(`Executing fastboot command: ${command}`);
    const result = await device.executeFastbootCommand(...command.split(/\s+/));
    if (result.exitCode !== 0) {
      throw new TargetSetupError(
        `Command ${command} failed, stdout = [${result.stdout}], stderr = [${result.stderr}].`,
        device.getDeviceDescriptor(),
        'OPTION_CONFIGURATION_ERROR'
      );
    }
    log.trace(`Command ${command} returned: stdout = [${result.stdout}], stderr = [${result.stderr}].`);
    return result;
  }

  private async getOemDeviceInfo(device: TestDevice): Promise<OemDeviceInfo> {
    // The bootloader prints device-info on stderr.
    const result = await this.executeFastbootCommand(device, 'oem device-info');
    const info = parseOemDeviceInfo(result.stderr);
    if (info.nrCpus.trim() === '' || info.mem.trim() === '') {
      throw new TargetSetupError(
        `Couldn't get current memory or CPU cores values. CPU: ${info.nrCpus}. Memory: ${info.mem}.`,
        device.getDeviceDescriptor(),
        'OPTION_CONFIGURATION_ERROR'
      );
    }
    return info;
  }

  private async isDeviceInLowPerformanceState(device: TestDevice): Promise<boolean> {
    return sameDeviceInfo(this.lowPerformanceDeviceInfo, await this.getOemDeviceInfo(device));
  }
}
