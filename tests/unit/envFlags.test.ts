import {
  debugLog,
  flagEnabled,
  isJestRuntime,
  isValidationDebugEnabled,
  readEnv,
} from '../../src/shared/utils/envFlags';

describe('envFlags helpers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('readEnv reads from process.env when present', () => {
    delete process.env.RANKFILE_TEST_FLAG;
    expect(readEnv('RANKFILE_TEST_FLAG')).toBeUndefined();

    process.env.RANKFILE_TEST_FLAG = 'abc';
    expect(readEnv('RANKFILE_TEST_FLAG')).toBe('abc');
  });

  it('flagEnabled accepts 1, true and TRUE only', () => {
    for (const value of ['1', 'true', 'TRUE']) {
      process.env.RANKFILE_TEST_FLAG = value;
      expect(flagEnabled('RANKFILE_TEST_FLAG')).toBe(true);
    }
    for (const value of ['', '0', 'false', 'yes', 'True']) {
      process.env.RANKFILE_TEST_FLAG = value;
      expect(flagEnabled('RANKFILE_TEST_FLAG')).toBe(false);
    }
    delete process.env.RANKFILE_TEST_FLAG;
    expect(flagEnabled('RANKFILE_TEST_FLAG')).toBe(false);
  });

  it('isValidationDebugEnabled follows RANKFILE_DEBUG_VALIDATION', () => {
    delete process.env.RANKFILE_DEBUG_VALIDATION;
    expect(isValidationDebugEnabled()).toBe(false);
    process.env.RANKFILE_DEBUG_VALIDATION = '1';
    expect(isValidationDebugEnabled()).toBe(true);
  });

  it('isJestRuntime detects the Jest worker', () => {
    expect(isJestRuntime()).toBe(true);
    delete process.env.JEST_WORKER_ID;
    expect(isJestRuntime()).toBe(false);
  });

  it('debugLog only writes when the condition holds', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugLog(false, 'hidden');
    expect(spy).not.toHaveBeenCalled();
    debugLog(true, 'shown', { n: 1 });
    expect(spy).toHaveBeenCalledWith('shown', { n: 1 });
  });
});
