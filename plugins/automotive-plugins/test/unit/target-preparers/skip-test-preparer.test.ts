import { HarnessErrorCode, TargetSetupError, TestInformation } from 'device-harness';
import { FakeTestDevice } from 'device-harness/testing';
import {
  SkipTestPreparer,
  evaluateSkipCondition,
  isSupportedOperator,
} from '../../../src/target-preparers/skip-test-preparer.js';

const SDK_PROPERTY = 'ro.build.version.sdk';

function deviceReporting(value: string): { device: FakeTestDevice; testInfo: TestInformation } {
  const device = new FakeTestDevice({ serial: 'emu-1' }).onShell(`getprop ${SDK_PROPERTY}`, { stdout: `${value}\n` });
  const testInfo = new TestInformation({ devices: [device], dependenciesFolder: '/deps', testcasesFolder: '/cases' });
  return { device, testInfo };
}

describe('evaluateSkipCondition', () => {
  it.each([
    ['lt', 30, 34, true],
    ['lt', 34, 34, false],
    ['gt', 35, 34, true],
    ['gt', 34, 34, false],
    ['eq', 34, 34, true],
    ['eq', 33, 34, false],
    ['neq', 33, 34, true],
    ['neq', 34, 34, false],
  ] as const)('%s(%i, %i) is %s', (op, actual, expected, result) => {
    expect(evaluateSkipCondition(op, actual, expected)).toBe(result);
  });
});

describe('isSupportedOperator', () => {
  it('accepts only the four comparison operators', () => {
    expect(['lt', 'gt', 'eq', 'neq', 'ge', 'LT', ''].filter(isSupportedOperator)).toEqual(['lt', 'gt', 'eq', 'neq']);
  });
});

describe('SkipTestPreparer', () => {
  it('does nothing when the property or operator is missing', async () => {
    const { device, testInfo } = deviceReporting('30');

    await SkipTestPreparer.fromConfig({ 'comp-property': SDK_PROPERTY }).setUp(testInfo);
    await SkipTestPreparer.fromConfig({ 'int-comparison-operator': 'lt' }).setUp(testInfo);

    expect(device.shellCommands).toEqual([]);
  });

  it('does nothing for an unsupported operator', async () => {
    const { device, testInfo } = deviceReporting('30');
    const preparer = SkipTestPreparer.fromConfig({
      'comp-property': SDK_PROPERTY,
      'comp-property-int-value': 34,
      'int-comparison-operator': 'ge',
    });

    await expect(preparer.setUp(testInfo)).resolves.toBeUndefined();
    expect(device.shellCommands).toEqual([]);
  });

  it('fails setUp when the skip condition holds', async () => {
    const { device, testInfo } = deviceReporting('30');
    const preparer = SkipTestPreparer.fromConfig({
      'comp-property': SDK_PROPERTY,
      'comp-property-int-value': 34,
      'int-comparison-operator': 'lt',
    });

    const error = await preparer.setUp(testInfo).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TargetSetupError);
    expect(error).toMatchObject({
      message: 'Test incompatible with ro.build.version.sdk = 30',
      deviceDescriptor: { serial: 'emu-1', state: 'ONLINE' },
    });
    expect(device.shellCommands).toEqual([`getprop ${SDK_PROPERTY}`]);
  });

  it('lets the module run when the condition does not hold', async () => {
    const { testInfo } = deviceReporting('34');
    const preparer = SkipTestPreparer.fromConfig({
      'comp-property': SDK_PROPERTY,
      'comp-property-int-value': 34,
      'int-comparison-operator': 'neq',
    });

    await expect(preparer.setUp(testInfo)).resolves.toBeUndefined();
  });

  it('compares against zero by default', async () => {
    const { testInfo } = deviceReporting('-1');
    const preparer = SkipTestPreparer.fromConfig({ 'comp-property': SDK_PROPERTY, 'int-comparison-operator': 'lt' });

    await expect(preparer.setUp(testInfo)).rejects.toThrow('Test incompatible with ro.build.version.sdk = -1');
  });

  it('fails setUp when the property is not an integer', async () => {
    const { testInfo } = deviceReporting('');
    const preparer = SkipTestPreparer.fromConfig({
      'comp-property': SDK_PROPERTY,
      'int-comparison-operator': 'eq',
    });

    await expect(preparer.setUp(testInfo)).rejects.toThrow('Property ro.build.version.sdk is not an integer: ""');
  });

  it('rejects a non-integer comparison value', () => {
    let caught: unknown;
    try {
      SkipTestPreparer.fromConfig({ 'comp-property-int-value': 'high' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({
      code: HarnessErrorCode.CONFIG_ERROR,
      message: 'Invalid options for skip-test-preparer: comp-property-int-value: Expected number, received string',
    });
  });
});
