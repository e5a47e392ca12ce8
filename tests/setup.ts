/**
 * Global test setup
 * Loaded by Vitest before every test file
 */

process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'silent';

// Settings from the developer's shell must not reach the tests
delete process.env['DATABASE_URL'];
delete process.env['PUBLIC_BASE_URL'];
