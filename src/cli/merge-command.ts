import chalk from 'chalk';
import { parseMergeOptions, shouldBackup, type MergeCommandInput } from '../core/config/parser.js';
import { SettingsError } from '../core/errors/index.js';
import { loadSettingsFiles } from '../core/io/loader.js';
import { resolveInputPaths } from '../core/io/inputs.js';
import { writeDocument } from '../core/io/writer.js';
import { logger } from '../core/logger.js';
import { countPatterns, mergeSettings } from '../permissions/merge.js';
import { serializeDocument } from '../permissions/emit.js';
import { writeStdout, type CommandContext } from './context.js';

/**
 * Run `permkit merge`. Resolves to the process exit code.
 *
 * Every input is loaded before anything is written, so a failing file never
 * leaves a partial merge behind.
 */
export async function runMerge(
  files: readonly string[],
  input: MergeCommandInput,
  context: CommandContext = {},
): Promise<number> {
  const cwd = context.cwd ?? process.cwd();
  const print = context.stdout ?? writeStdout;

  try {
    const options = parseMergeOptions(input);
    const inputs = await resolveInputPaths(files, { cwd });

    logger.info(`Merging ${inputs.length} files...`);
    const merged = mergeSettings(await loadSettingsFiles(inputs, { cwd }));
    const counts = countPatterns(merged);
    logger.debug(`Merged ${counts.allow} allow and ${counts.deny} deny patterns`);

    const output = serializeDocument(merged, { indent: options.indent, compact: options.compact });

    if (!options.output) {
      print(output);
      return 0;
    }

    const result = await writeDocument(options.output, output, { backup: shouldBackup(options), cwd });
    if (result.backupPath) {
      logger.info(`Created backup '${result.backupPath}'`);
    }
    logger.success(`Successfully wrote merged settings to '${result.path}'`);
    return 0;
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(chalk.red('Error:'), error.message);
    if (error instanceof SettingsError && error.suggestion) {
      console.error(chalk.dim(error.suggestion));
    }
    return 1;
  }
}
