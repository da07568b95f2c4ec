export {
  ChromeMdPassengerLoadPreparer,
  CHROME_MD_PASSENGER_LOAD_ALIAS,
  CHROME_BETA_PACKAGE,
  DEFAULT_YOUTUBE_PACKAGE,
  SETUP_WIZARD_EXIT_ACTIVITY,
  chromeMdPassengerLoadSchema,
} from './target-preparers/chrome-md-passenger-load-preparer.js';
export type { ChromeMdPassengerLoadOptions } from './target-preparers/chrome-md-passenger-load-preparer.js';
export {
  SkipTestPreparer,
  SKIP_TEST_ALIAS,
  SUPPORTED_OPERATORS,
  evaluateSkipCondition,
  isSupportedOperator,
  skipTestSchema,
} from './target-preparers/skip-test-preparer.js';
export type { ComparisonOperator, SkipTestOptions } from './target-preparers/skip-test-preparer.js';
export {
  LowPerformanceTargetPreparer,
  LOW_PERFORMANCE_ALIAS,
  lowPerformanceSchema,
  parseOemDeviceInfo,
  sameDeviceInfo,
} from './target-preparers/low-performance-preparer.js';
export type { LowPerformanceOptions, OemDeviceInfo } from './target-preparers/low-performance-preparer.js';
export { MopedRunner, MOPED_ALIAS, artifactDirectoryName, isTarballName, mopedRunnerSchema } from './runner/moped-runner.js';
export type { MopedRunnerOptions } from './runner/moped-runner.js';
export { registerAutomotivePlugins, createDefaultRegistry } from './register.js';
export { main } from './cli.js';
