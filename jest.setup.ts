/**
 * Jest setup file.
 * Keep the pino logger quiet unless a test run asks for output.
 */

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}

export {};
