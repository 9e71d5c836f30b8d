/**
 * Runs before every test file: test mode, no log output.
 */

process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'silent';
