import type { TestInformation } from '../invocation/test-information.js';
import type { TestInvocationListener } from '../invocation/listener.js';
import type { BaseTargetPreparerOptions } from '../config/options.js';

/** A plugin invoked before and after the tests to put devices in a known state. */
export interface TargetPreparer {
  readonly alias: string;
  isDisabled(): boolean;
  isTearDownDisabled(): boolean;
  setUp(testInfo: TestInformation): Promise<void>;
  tearDown(testInfo: TestInformation, error?: unknown): Promise<void>;
}

export abstract class BaseTargetPreparer<TOptions extends BaseTargetPreparerOptions = BaseTargetPreparerOptions>
  implements TargetPreparer
{
  abstract readonly alias: string;
  protected readonly options: TOptions;

  constructor(options: TOptions) {
    this.options = options;
  }

  isDisabled(): boolean {
    return this.options.disable;
  }

  isTearDownDisabled(): boolean {
    return this.options.disableTearDown;
  }

  abstract setUp(testInfo: TestInformation): Promise<void>;

  // Most preparers leave the device as they found it; override where that is not true.
  async tearDown(_testInfo: TestInformation, _error?: unknown): Promise<void> {}
}

/** A plugin that runs tests against the prepared devices. */
export interface RemoteTest {
  readonly alias: string;
  run(testInfo: TestInformation, listener: TestInvocationListener): Promise<void>;
}
