import { PluginRegistry, registerBuiltins } from 'device-harness';
import {
  CHROME_MD_PASSENGER_LOAD_ALIAS,
  ChromeMdPassengerLoadPreparer,
} from './target-preparers/chrome-md-passenger-load-preparer.js';
import { LOW_PERFORMANCE_ALIAS, LowPerformanceTargetPreparer } from './target-preparers/low-performance-preparer.js';
import { SKIP_TEST_ALIAS, SkipTestPreparer } from './target-preparers/skip-test-preparer.js';
import { MOPED_ALIAS, MopedRunner } from './runner/moped-runner.js';

export function registerAutomotivePlugins(registry: PluginRegistry): void {
  registry.registerPreparer(CHROME_MD_PASSENGER_LOAD_ALIAS, raw => ChromeMdPassengerLoadPreparer.fromConfig(raw));
  registry.registerPreparer(SKIP_TEST_ALIAS, raw => SkipTestPreparer.fromConfig(raw));
  registry.registerPreparer(LOW_PERFORMANCE_ALIAS, raw => LowPerformanceTargetPreparer.fromConfig(raw));
  registry.registerTest(MOPED_ALIAS, raw => MopedRunner.fromConfig(raw));
}

/** A registry holding the built-in preparers plus every automotive plugin. */
export function createDefaultRegistry(): PluginRegistry {
  const registry = new PluginRegistry();
  registerBuiltins(registry);
  registerAutomotivePlugins(registry);
  return registry;
}
