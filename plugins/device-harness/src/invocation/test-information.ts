import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { TestDevice } from '../device/types.js';

export interface TestInformationInit {
  devices: TestDevice[];
  dependenciesFolder: string;
  testcasesFolder: string;
}

// Per-invocation context handed to every preparer and test.
export class TestInformation {
  readonly devices: readonly TestDevice[];
  readonly dependenciesFolder: string;
  readonly testcasesFolder: string;

  constructor(init: TestInformationInit) {
    if (init.devices.length === 0) {
      throw new HarnessError(HarnessErrorCode.CONFIG_ERROR, 'An invocation needs at least one device');
    }
    this.devices = [...init.devices];
    this.dependenciesFolder = init.dependenciesFolder;
    this.testcasesFolder = init.testcasesFolder;
  }

  /** The primary device: the first one configured. */
  get device(): TestDevice {
    const [primary] = this.devices;
    if (!primary) {
      throw new HarnessError(HarnessErrorCode.CONFIG_ERROR, 'An invocation needs at least one device');
    }
    return primary;
  }
}
