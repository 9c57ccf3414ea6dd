/**
 * Vitest Setup File
 * Global test configuration
 */

// Environment for tests; loggers created without an explicit level stay quiet
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
