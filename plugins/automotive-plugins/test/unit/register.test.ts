import { PluginRegistry, TestAppInstallSetup } from 'device-harness';
import { createDefaultRegistry, registerAutomotivePlugins } from '../../src/register.js';
import { ChromeMdPassengerLoadPreparer } from '../../src/target-preparers/chrome-md-passenger-load-preparer.js';
import { LowPerformanceTargetPreparer } from '../../src/target-preparers/low-performance-preparer.js';
import { SkipTestPreparer } from '../../src/target-preparers/skip-test-preparer.js';
import { MopedRunner } from '../../src/runner/moped-runner.js';

describe('createDefaultRegistry', () => {
  it('builds each plugin from its alias', () => {
    const registry = createDefaultRegistry();

    expect(registry.createPreparer('chrome-md-passenger-load', { url: 'https://video.example.test' })).toBeInstanceOf(
      ChromeMdPassengerLoadPreparer
    );
    expect(registry.createPreparer('low-performance', {})).toBeInstanceOf(LowPerformanceTargetPreparer);
    expect(registry.createPreparer('skip-test-preparer', {})).toBeInstanceOf(SkipTestPreparer);
    expect(registry.createPreparer('test-app-install', {})).toBeInstanceOf(TestAppInstallSetup);
    expect(registry.createTest('aaos-moped-test', {})).toBeInstanceOf(MopedRunner);
  });

  it('refuses to register the automotive plugins twice', () => {
    const registry = new PluginRegistry();
    registerAutomotivePlugins(registry);

    expect(() => registerAutomotivePlugins(registry)).toThrow(
      'Target preparer already registered: chrome-md-passenger-load'
    );
  });
});
