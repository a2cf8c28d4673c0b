import { glob } from 'glob';
import path from 'path';
import { dedupePatterns } from '../../permissions/dedupe.js';
import { SettingsError, SettingsErrorCode } from '../errors/index.js';
import { logger } from '../logger.js';

export interface ResolveInputOptions {
  cwd?: string;
}

export function isGlobPattern(arg: string): boolean {
  return arg.includes('*');
}

/**
 * Expand the file arguments of `merge`.
 *
 * Arguments containing `*` are globbed relative to cwd (sorted); anything else
 * is kept as written so a missing file is reported by the loader. Repeated
 * paths keep their first position.
 */
export async function resolveInputPaths(args: readonly string[], options: ResolveInputOptions = {}): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const expanded: string[] = [];

  for (const arg of args) {
    if (!isGlobPattern(arg)) {
      expanded.push(arg);
      continue;
    }

    const matches = await glob(arg, { cwd, nodir: true, dot: true });
    if (matches.length === 0) {
      logger.warn(`No files match pattern '${arg}'`);
    }
    expanded.push(...matches.sort());
  }

  const unique = dedupePatterns([expanded.map((file) => path.normalize(file))]);
  if (unique.length === 0) {
    throw new SettingsError('No files to merge', SettingsErrorCode.NO_INPUT, {
      suggestion: 'Pass at least one settings file or a pattern that matches one.',
    });
  }

  return unique;
}
