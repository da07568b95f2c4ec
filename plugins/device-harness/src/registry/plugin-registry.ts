import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { RemoteTest, TargetPreparer } from '../preparer/base.js';
import { TEST_APP_INSTALL_ALIAS, TestAppInstallSetup } from '../preparer/test-app-install.js';

// Factories receive the raw `options` block from the invocation config and validate it themselves.
export type PreparerFactory = (rawOptions: unknown) => TargetPreparer;
export type TestFactory = (rawOptions: unknown) => RemoteTest;

export interface PluginAliases {
  targetPreparers: string[];
  tests: string[];
}

export class PluginRegistry {
  private readonly preparers = new Map<string, PreparerFactory>();
  private readonly tests = new Map<string, TestFactory>();

  registerPreparer(alias: string, factory: PreparerFactory): void {
    if (this.preparers.has(alias)) {
      throw new HarnessError(HarnessErrorCode.CONFIG_ERROR, `Target preparer already registered: ${alias}`);
    }
    this.preparers.set(alias, factory);
  }

  registerTest(alias: string, factory: TestFactory): void {
    if (this.tests.has(alias)) {
      throw new HarnessError(HarnessErrorCode.CONFIG_ERROR, `Test already registered: ${alias}`);
    }
    this.tests.set(alias, factory);
  }

  createPreparer(alias: string, rawOptions: unknown): TargetPreparer {
    const factory = this.preparers.get(alias);
    if (!factory) {
      throw new HarnessError(HarnessErrorCode.PLUGIN_NOT_FOUND, `Unknown target preparer: ${alias}`, {
        known: [...this.preparers.keys()],
      });
    }
    return factory(rawOptions);
  }

  createTest(alias: string, rawOptions: unknown): RemoteTest {
    const factory = this.tests.get(alias);
    if (!factory) {
      throw new HarnessError(HarnessErrorCode.PLUGIN_NOT_FOUND, `Unknown test: ${alias}`, {
        known: [...this.tests.keys()],
      });
    }
    return factory(rawOptions);
  }

  listAliases(): PluginAliases {
    return {
      targetPreparers: [...this.preparers.keys()].sort(),
      tests: [...this.tests.keys()].sort(),
    };
  }
}

export function registerBuiltins(registry: PluginRegistry): void {
  registry.registerPreparer(TEST_APP_INSTALL_ALIAS, raw => TestAppInstallSetup.fromConfig(raw));
}
