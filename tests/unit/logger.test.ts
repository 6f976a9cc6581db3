import { getMatchContext, maskSensitiveData, runWithMatchContext } from '../../src/server/utils/logger';

describe('maskSensitiveData', () => {
  it('redacts sensitive keys and keeps the rest', () => {
    expect(
      maskSensitiveData({
        matchId: 'm-1',
        password: 'short',
        authToken: 'abcdefghijkl',
        retries: 3,
        apiKey: 42,
      })
    ).toEqual({
      matchId: 'm-1',
      password: '[REDACTED]',
      authToken: 'abcd...[REDACTED]',
      retries: 3,
      apiKey: '[REDACTED]',
    });
  });

  it('walks nested objects and arrays', () => {
    expect(
      maskSensitiveData({
        redis: { url: 'redis://localhost:6379', password: null },
        participants: [{ id: 'user:1', sessionId: 'test-session' }],
      })
    ).toEqual({
      redis: { url: 'redis://localhost:6379', password: null },
      participants: [{ id: 'user:1', sessionId: 'test...[REDACTED]' }],
    });
  });

  it('stops at the depth limit', () => {
    expect(maskSensitiveData({ a: { b: 1 } }, 1)).toEqual({ a: '[MAX_DEPTH_EXCEEDED]' });
    expect(maskSensitiveData('plain')).toBe('plain');
  });
});

describe('match log context', () => {
  it('is visible inside the callback and across awaits only', async () => {
    expect(getMatchContext()).toBeUndefined();

    const seen = await runWithMatchContext({ matchId: 'm-1', operation: 'makeMove' }, async () => {
      await Promise.resolve();
      return getMatchContext();
    });

    expect(seen).toEqual({ matchId: 'm-1', operation: 'makeMove' });
    expect(getMatchContext()).toBeUndefined();
  });
});
