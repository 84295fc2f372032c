import { spawn } from 'node:child_process';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger } from './lib/logger.js';
import { findTestFiles } from './lib/test-files.js';
import { errorMessage } from './queue/errors.js';

// Node 20's test runner neither expands globs nor picks up .ts files on its own.
const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const logger = createLogger('test');

const files = findTestFiles(PROJECT_ROOT);
if (files.length === 0) {
  logger.error('no test files found under src/');
  process.exit(1);
}

const child = spawn(process.execPath, ['--import', 'tsx', '--test', ...files], {
  cwd: PROJECT_ROOT,
  stdio: 'inherit'
});
child.on('error', (error) => {
  logger.error('could not start the test runner', { error: errorMessage(error) });
  process.exit(1);
});
child.on('close', (code) => process.exit(code ?? 1));
