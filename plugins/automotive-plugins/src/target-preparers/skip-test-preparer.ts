import { z } from 'zod';
import {
  BaseTargetPreparer,
  TargetSetupError,
  baseOptionsFrom,
  baseTargetPreparerSchema,
  createLogger,
  parseOptions,
} from 'device-harness';
import type { BaseTargetPreparerOptions, TestInformation } from 'device-harness';

const log = createLogger('skip-test-preparer');

export const SKIP_TEST_ALIAS = 'skip-test-preparer';

export const SUPPORTED_OPERATORS = ['lt', 'gt', 'eq', 'neq'] as const;
export type ComparisonOperator = (typeof SUPPORTED_OPERATORS)[number];

export const skipTestSchema = baseTargetPreparerSchema
  .extend({
    'comp-property': z.string().min(1).optional(),
    'comp-property-int-value': z.number().int().default(0),
    'int-comparison-operator': z.string().optional(),
  })
  .transform(raw => ({
    ...baseOptionsFrom(raw),
    compProperty: raw['comp-property'],
    compPropertyIntValue: raw['comp-property-int-value'],
    intComparisonOperator: raw['int-comparison-operator'],
  }));

export interface SkipTestOptions extends BaseTargetPreparerOptions {
  compProperty?: string;
  compPropertyIntValue: number;
  intComparisonOperator?: string;
}

export function isSupportedOperator(op: string): op is ComparisonOperator {
  return SUPPORTED_OPERATORS.some(supported => supported === op);
}

const OPERATOR_SYMBOLS: Record<ComparisonOperator, string> = {
  lt: '<',
  gt: '>',
  eq: '==',
  neq: '!=',
};

export function evaluateSkipCondition(op: ComparisonOperator, actual: number, expected: number): boolean {
  switch (op) {
    case 'lt':
      return actual < expected;
    case 'gt':
      return actual > expected;
    case 'eq':
      return actual === expected;
    case 'neq':
      return actual !== expected;
  }
}

/**
 * Skips the test module when an integer system property on the device
 * satisfies the configured comparison, by failing setUp.
 */
export class SkipTestPreparer extends BaseTargetPreparer<SkipTestOptions> {
  readonly alias = SKIP_TEST_ALIAS;

  static fromConfig(raw: unknown = {}): SkipTestPreparer {
    return new SkipTestPreparer(parseOptions(SKIP_TEST_ALIAS, skipTestSchema, raw));
  }

  async setUp(testInfo: TestInformation): Promise<void> {
    const { compProperty, compPropertyIntValue, intComparisonOperator } = this.options;
    if (compProperty === undefined || intComparisonOperator === undefined) {
      log.info('Missing value for comp-property or int-comparison-operator. Skipping preparer.');
      return;
    }

    if (!isSupportedOperator(intComparisonOperator)) {
      log.warn(`Incompatible operator ${intComparisonOperator}. Skipping preparer`);
      log.info(`Supported operators are ${SUPPORTED_OPERATORS.join(',')}`);
      return;
    }

    const device = testInfo.device;
    const output = (await device.executeShellCommand(`getprop ${compProperty}`)).trim();
    if (!/^-?\d+$/.test(output)) {
      throw new TargetSetupError(
        `Property ${compProperty} is not an integer: "${output}"`,
        device.getDeviceDescriptor()
      );
    }
    const devicePropertyValue = Number.parseInt(output, 10);
    log.info(`${compProperty} returned ${devicePropertyValue}`);

    log.info(
      `Checking skip condition ${devicePropertyValue} ${OPERATOR_SYMBOLS[intComparisonOperator]} ${compPropertyIntValue}`
    );
    if (evaluateSkipCondition(intComparisonOperator, devicePropertyValue, compPropertyIntValue)) {
      log.info('Skip condition satisfied. Skipping test module.');
      throw new TargetSetupError(
        `Test incompatible with ${compProperty} = ${devicePropertyValue}`,
        device.getDeviceDescriptor()
      );
    }
    log.info('Skip condition not satisfied. Proceeding with test module.');
  }
}
