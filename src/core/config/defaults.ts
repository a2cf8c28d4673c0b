/**
 * permkit defaults
 *
 * Values the commands fall back to when no option or environment override is given.
 */

import { getEnv } from '../../utils/index.js';

/** Spaces of JSON indentation for written documents */
export const DEFAULT_INDENT = 2;

/** Suffix appended to an existing output file when it is backed up */
export const BACKUP_SUFFIX = '.bak';

/** Extension of the documents written by `convert` */
export const OUTPUT_EXTENSION = '.json';

/** Markdown files picked up by `convert` in the working directory */
export const DEFAULT_MARKDOWN_PATTERN = 'gh-*.md';

/** consola "info" level */
export const DEFAULT_LOG_LEVEL = 3;

export function getMarkdownPattern(): string {
  return getEnv('PERMKIT_MARKDOWN_PATTERN', DEFAULT_MARKDOWN_PATTERN);
}

export function getLogLevel(): number {
  const level = Number.parseInt(getEnv('PERMKIT_LOG_LEVEL', String(DEFAULT_LOG_LEVEL)), 10);
  return Number.isNaN(level) ? DEFAULT_LOG_LEVEL : level;
}
