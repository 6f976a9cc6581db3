/**
 * Jest Environment Setup
 * Runs BEFORE the test framework is installed.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.LOG_FORMAT = 'json';

// Unit tests never talk to a real Redis; keep the sentinel off unless a test opts in.
process.env.ENABLE_TIMEOUT_SENTINEL = 'false';
