import {
  readEnv,
  flagEnabled,
  isJestRuntime,
  isSearchTraceEnabled,
} from '../../src/shared/utils/envFlags';

describe('envFlags helpers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('readEnv reads from process.env when present', () => {
    delete process.env.ATAXX_TEST_FLAG;
    expect(readEnv('ATAXX_TEST_FLAG')).toBeUndefined();

    process.env.ATAXX_TEST_FLAG = 'abc';
    expect(readEnv('ATAXX_TEST_FLAG')).toBe('abc');
  });

  it('flagEnabled returns true only for "1", "true", or "TRUE"', () => {
    for (const value of ['1', 'true', 'TRUE']) {
      process.env.ATAXX_FLAG = value;
      expect(flagEnabled('ATAXX_FLAG')).toBe(true);
    }
    for (const value of ['0', 'false', 'yes', '']) {
      process.env.ATAXX_FLAG = value;
      expect(flagEnabled('ATAXX_FLAG')).toBe(false);
    }
    delete process.env.ATAXX_FLAG;
    expect(flagEnabled('ATAXX_FLAG')).toBe(false);
  });

  it('isJestRuntime sees the Jest worker id', () => {
    expect(isJestRuntime()).toBe(true);
  });

  it('isSearchTraceEnabled follows ATAXX_SEARCH_TRACE', () => {
    delete process.env.ATAXX_SEARCH_TRACE;
    expect(isSearchTraceEnabled()).toBe(false);
    process.env.ATAXX_SEARCH_TRACE = 'true';
    expect(isSearchTraceEnabled()).toBe(true);
  });
});
