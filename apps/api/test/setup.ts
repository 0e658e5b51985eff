import 'reflect-metadata';
import { config } from 'dotenv';
import { dirname, resolve } from 'path';

// Load test environment variables
config({ path: resolve(__dirname, '../.env.test') });

// better-sqlite3 loads its native addon once per worker process and registers
// SqliteError only on first use. Clear that flag so each test file registers
// the SqliteError of its own module registry, keeping `instanceof Error` intact.
const betterSqliteRoot = dirname(require.resolve('better-sqlite3/package.json'));
require(resolve(betterSqliteRoot, 'build/Release/better_sqlite3.node')).isInitialized = false;

// Set test environment
process.env.NODE_ENV = 'test';

// Increase timeout for integration tests
jest.setTimeout(30000);
