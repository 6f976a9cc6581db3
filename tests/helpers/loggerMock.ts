/**
 * Factory for `jest.mock('../../src/server/utils/logger', ...)` so tests
 * can assert on log calls without a console transport.
 */
export const createLoggerMock = () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
  runWithMatchContext: <T>(_context: unknown, fn: () => T): T => fn(),
  getMatchContext: () => undefined,
});
