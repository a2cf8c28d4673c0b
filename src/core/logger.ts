import { createConsola } from 'consola';
import { getLogLevel } from './config/defaults.js';

/**
 * Progress and status messages go to stderr so stdout only carries
 * the document a command produces.
 */
export const logger = createConsola({
  level: getLogLevel(),
  stdout: process.stderr,
  stderr: process.stderr,
});
