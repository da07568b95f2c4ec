import { z } from 'zod';
import {
  BaseTargetPreparer,
  TargetSetupError,
  TestAppInstallSetup,
  baseOptionsFrom,
  baseTargetPreparerSchema,
  createLogger,
  parseOptions,
} from 'device-harness';
import type { BaseTargetPreparerOptions, TestDevice, TestInformation } from 'device-harness';

const log = createLogger('chrome-md-passenger-load');

export const CHROME_MD_PASSENGER_LOAD_ALIAS = 'chrome-md-passenger-load';
export const DEFAULT_YOUTUBE_PACKAGE = 'com.google.android.apps.automotive.youtube';
export const CHROME_BETA_PACKAGE = 'com.chrome.beta';
export const SETUP_WIZARD_EXIT_ACTIVITY = 'com.google.android.car.setupwizard/.ExitActivity';
// The driver's display; its user is the current foreground user.
const DRIVER_DISPLAY_ID = 0;

export const chromeMdPassengerLoadSchema = baseTargetPreparerSchema
  .extend({
    'skip-display-id': z.array(z.number().int().nonnegative()).default(() => []),
    'skip-passenger-loading': z.boolean().default(false),
    'post-test-cleanup': z.boolean().default(true),
    'url': z.string().min(1),
    'package': z.string().min(1).default(DEFAULT_YOUTUBE_PACKAGE),
    'install-apk': z.boolean().default(false),
    'max-users': z.number().int().positive().default(10),
    'test-app-file-name': z.array(z.string().min(1)).default(() => []),
  })
  .transform(raw => ({
    ...baseOptionsFrom(raw),
    skipDisplayIds: raw['skip-display-id'],
    skipPassengerLoading: raw['skip-passenger-loading'],
    postTestCleanup: raw['post-test-cleanup'],
    url: raw['url'],
    packageName: raw['package'],
    installApk: raw['install-apk'],
    maxUsers: raw['max-users'],
    testAppFileNames: raw['test-app-file-name'],
  }));

export interface ChromeMdPassengerLoadOptions extends BaseTargetPreparerOptions {
  skipDisplayIds: number[];
  /** Only create the passenger users; do not install or launch anything for them. */
  skipPassengerLoading: boolean;
  /** Remove the passenger users on tearDown. */
  postTestCleanup: boolean;
  /** Video URL each passenger plays. */
  url: string;
  packageName: string;
  /** Re-install a custom YouTube APK for every passenger. */
  installApk: boolean;
  maxUsers: number;
  testAppFileNames: string[];
}

/**
 * Simulates passenger load on a multi-display automotive device: one visible
 * background user per passenger display, each playing a video full screen.
 */
export class ChromeMdPassengerLoadPreparer extends BaseTargetPreparer<ChromeMdPassengerLoadOptions> {
  readonly alias = CHROME_MD_PASSENGER_LOAD_ALIAS;

  private readonly displayToCreatedUsers = new Map<number, number>();
  private readonly installPreparers: TestAppInstallSetup[] = [];

  static fromConfig(raw: unknown = {}): ChromeMdPassengerLoadPreparer {
    return new ChromeMdPassengerLoadPreparer(
      parseOptions(CHROME_MD_PASSENGER_LOAD_ALIAS, chromeMdPassengerLoadSchema, raw)
    );
  }

  /** Display id to passenger user id, for the users this preparer created. */
  getCreatedUsers(): ReadonlyMap<number, number> {
    return new Map(this.displayToCreatedUsers);
  }

  async setUp(testInfo: TestInformation): Promise<void> {
    const device = testInfo.device;
    await this.increaseSupportedUsers(device);

    const displayIds = await device.listDisplayIdsForStartingVisibleBackgroundUsers();
    for (const displayId of displayIds) {
      const userId = await this.createAndStartUser(device, displayId);
      log.debug(`Created and started new passenger user: ${userId} on Display: ${displayId}`);
      this.displayToCreatedUsers.set(displayId, userId);
    }

    await this.skipGtos(device);
    await this.skipSuw(device);
    await this.dismissChromeDialogs(device);

    if (this.options.skipPassengerLoading) {
      log.debug('Passenger loading disabled; users created only');
      return;
    }

    if (this.options.installApk) {
      await this.installApk(testInfo);
    }

    for (const [displayId, userId] of this.displayToCreatedUsers) {
      if (this.options.skipDisplayIds.includes(displayId)) {
        log.debug(`Skipping load on display ${displayId}`);
        continue;
      }
      await this.simulatePassengerLoad(device, userId);
    }
  }

  async tearDown(testInfo: TestInformation): Promise<void> {
    const device = testInfo.device;
    if (!this.options.skipPassengerLoading) {
      await this.stopTestApps(device);
    }

    await this.stopUsers(device);

    for (const installPreparer of this.installPreparers) {
      await installPreparer.tearDown(testInfo);
    }

    if (this.options.postTestCleanup) {
      for (const userId of this.displayToCreatedUsers.values()) {
        log.debug(`Removing user: ${userId}`);
        await device.removeUser(userId);
      }
    }
    this.displayToCreatedUsers.clear();
    this.installPreparers.length = 0;
    await device.reboot();
  }

  private async increaseSupportedUsers(device: TestDevice): Promise<void> {
    log.debug(`Temporarily increasing maximum supported users to ${this.options.maxUsers}`);
    const result = await device.executeShellV2Command(`setprop fw.max_users ${this.options.maxUsers}`);
    if (result.status !== 'SUCCESS') {
      throw new TargetSetupError('Failed to increase the number of supported users', device.getDeviceDescriptor());
    }
    log.debug('Successfully increased the maximum supported users');
  }

  private async createAndStartUser(device: TestDevice, displayId: number): Promise<number> {
    const userId = await device.createUser(`user-display-${displayId}`);
    log.debug(`Created user with id ${userId} for display ${displayId}`);
    if (!(await device.startVisibleBackgroundUser(userId, displayId, true))) {
      throw new TargetSetupError(`Device failed to switch to user ${userId}`, device.getDeviceDescriptor());
    }
    log.debug(`Started background user ${userId} for display ${displayId}`);
    return userId;
  }

  private async getCurrentUser(device: TestDevice): Promise<number> {
    log.debug('Getting the current user ID');
    const result = await device.executeShellV2Command('am get-current-user');
    const output = result.stdout.trim();
    if (result.exitCode !== 0 || !/^\d+$/.test(output)) {
      throw new TargetSetupError('Failed to get the current user', device.getDeviceDescriptor());
    }
    return Number.parseInt(output, 10);
  }

  // Accepts the Google terms of service for every user, lifting the
  // restrictions placed on Google apps until they are accepted.
  private async skipGtos(device: TestDevice): Promise<void> {
    log.debug('Skipping gTOS on behalf of all users');
    if (!(await device.isAdbRoot())) {
      await device.enableAdbRoot();
    }
    const gasPackageNames = [
      'com.google.android.apps.maps',
      'com.android.vending',
      'com.google.android.carassistant',
      this.options.packageName,
      CHROME_BETA_PACKAGE,
    ];

    const allDisplaysToUsers = new Map(this.displayToCreatedUsers);
    allDisplaysToUsers.set(DRIVER_DISPLAY_ID, await this.getCurrentUser(device));

    for (const userId of allDisplaysToUsers.values()) {
      for (const gasPackageName of gasPackageNames) {
        const enableResult = await device.executeShellV2Command(`pm enable --user ${userId} ${gasPackageName}`);
        if (enableResult.exitCode !== 0) {
          throw new TargetSetupError(
            `Failed to skip gTOS for user: ${userId} and package: ${gasPackageName}`,
            device.getDeviceDescriptor()
          );
        }
      }
      const acceptResult = await device.executeShellV2Command(
        `settings put secure --user ${userId} android.car.KEY_USER_TOS_ACCEPTED 2`
      );
      if (acceptResult.exitCode !== 0) {
        throw new TargetSetupError(`Failed to accept gTOS for user: ${userId}`, device.getDeviceDescriptor());
      }
    }
    log.debug('Successfully skipped gTOS across all passenger users');
  }

  private async skipSuw(device: TestDevice): Promise<void> {
    log.debug('Skipping set-up wizard for all passenger users');
    for (const userId of this.displayToCreatedUsers.values()) {
      const result = await device.executeShellV2Command(`am start --user ${userId} -n ${SETUP_WIZARD_EXIT_ACTIVITY}`);
      if (result.exitCode !== 0) {
        throw new TargetSetupError(
          `Failed to skip the set-up wizard for user: ${userId}`,
          device.getDeviceDescriptor()
        );
      }
    }
    log.debug('Successfully skipped set-up wizard across all passenger users');
  }

  private async dismissChromeDialogs(device: TestDevice): Promise<void> {
    log.debug('Dismissing initial Chrome Dialogs');
    const result = await device.executeShellV2Command(`am set-debug-app --persistent ${CHROME_BETA_PACKAGE}`);
    if (result.exitCode !== 0) {
      log.debug('Failed to dismiss Chrome dialogs');
      return;
    }
    log.debug('Successfully dismissed initial Chrome Dialogs');
  }

  private async installApk(testInfo: TestInformation): Promise<void> {
    for (const userId of this.displayToCreatedUsers.values()) {
      log.debug(`Installing the following test APKs in user ${userId}: ${this.options.testAppFileNames.join(', ')}`);
      const installPreparer = TestAppInstallSetup.fromConfig();
      installPreparer.setUserId(userId);
      installPreparer.setShouldGrantPermission(true);
      for (const fileName of this.options.testAppFileNames) {
        installPreparer.addTestFileName(fileName);
      }
      installPreparer.addInstallArg('-r');
      installPreparer.addInstallArg('-d');
      await installPreparer.setUp(testInfo);
      this.installPreparers.push(installPreparer);
    }
  }

  private async simulatePassengerLoad(device: TestDevice, userId: number): Promise<void> {
    log.debug(`Launching the Youtube App for User: ${userId} with url: ${this.options.url}`);
    const command =
      `am start --user ${userId} -a android.intent.action.VIEW -e FullScreen true ` +
      `-d "${this.options.url}" ${this.options.packageName}`;
    log.debug(`Youtube launch command: ${command}`);
    const result = await device.executeShellV2Command(command);
    if (result.status !== 'SUCCESS') {
      throw new TargetSetupError(
        `Failed to launch the Youtube app for the user ${userId}`,
        device.getDeviceDescriptor()
      );
    }
    log.debug(`Successfully launched the Youtube video for user: ${userId}`);
  }

  private async stopTestApps(device: TestDevice): Promise<void> {
    log.debug('Stopping the Youtube application for all the passengers');
    for (const userId of this.displayToCreatedUsers.values()) {
      const stopYoutube = await device.executeShellV2Command(
        `am force-stop --user ${userId} ${this.options.packageName}`
      );
      const stopChrome = await device.executeShellV2Command(`am force-stop --user ${userId} ${CHROME_BETA_PACKAGE}`);
      if (stopYoutube.exitCode !== 0 || stopChrome.exitCode !== 0) {
        log.debug(`Failed to kill the Youtube application for user: ${userId}`);
      }
    }
  }

  private async stopUsers(device: TestDevice): Promise<void> {
    log.debug('Stopping all passenger users');
    for (const userId of this.displayToCreatedUsers.values()) {
      const result = await device.executeShellV2Command(`am stop-user ${userId}`);
      if (result.exitCode !== 0) {
        log.debug(`Failed to stop the user: ${userId}`);
      }
    }
    log.debug('Successfully stopped all passenger users');
  }
}
