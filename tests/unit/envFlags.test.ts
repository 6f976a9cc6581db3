import { isJestRuntime, readEnv } from '../../src/shared/utils/envFlags';

describe('envFlags', () => {
  const ORIGINAL_ENV = process.env;

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  it('reads string values and reports missing ones as undefined', () => {
    process.env.MATCH_FLAG = 'on';
    delete process.env.MATCH_MISSING;

    expect(readEnv('MATCH_FLAG')).toBe('on');
    expect(readEnv('MATCH_MISSING')).toBeUndefined();
  });

  it('detects the Jest worker regardless of NODE_ENV', () => {
    process.env.NODE_ENV = 'development';
    expect(isJestRuntime()).toBe(true);

    delete process.env.JEST_WORKER_ID;
    expect(isJestRuntime()).toBe(false);
  });
});
