/**
 * Vitest Setup
 *
 * Runs before every test file.
 */

import { LoggerFactory } from '../logging/logger';

// Loggers stay quiet unless a test asks otherwise
process.env.NODE_ENV = 'test';
LoggerFactory.configure({ silent: true });
