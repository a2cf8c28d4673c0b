import fs from 'fs-extra';
import { glob } from 'glob';
import path from 'path';
import { DEFAULT_INDENT, OUTPUT_EXTENSION, getMarkdownPattern } from '../core/config/defaults.js';
import { errorMessage } from '../core/errors/index.js';
import { writeDocument } from '../core/io/writer.js';
import { logger } from '../core/logger.js';
import { dedupePatterns } from '../permissions/dedupe.js';
import { createPermissionDocument, serializeDocument } from '../permissions/emit.js';
import { collectBulletPatterns, splitLines } from '../permissions/extract.js';
import type { CommandContext } from './context.js';

const DIVIDER = '-'.repeat(50);

export interface ConvertedFile {
  source: string;
  output: string;
  /** Bullet lines found, duplicates included */
  patternCount: number;
}

export interface ConvertSummary {
  converted: ConvertedFile[];
  failed: string[];
}

/**
 * Output path for a markdown file: same directory and name, `.json` extension
 */
export function outputPathFor(markdownPath: string): string {
  const parsed = path.parse(markdownPath);
  return path.join(parsed.dir, `${parsed.name}${OUTPUT_EXTENSION}`);
}

/**
 * Convert one markdown file into a sibling permissions document.
 * Existing output is replaced without a backup.
 */
export async function convertMarkdownFile(markdownPath: string, cwd: string = process.cwd()): Promise<ConvertedFile> {
  const content = await fs.readFile(path.resolve(cwd, markdownPath), 'utf-8');
  const patterns = collectBulletPatterns(splitLines(content));
  const document = createPermissionDocument(dedupePatterns([patterns]));

  const output = outputPathFor(markdownPath);
  await writeDocument(output, serializeDocument(document, { indent: DEFAULT_INDENT }), { backup: false, cwd });

  return { source: markdownPath, output, patternCount: patterns.length };
}

/**
 * Run `permkit convert`: every matching markdown file in cwd is converted on
 * its own; a failing file is logged and the run goes on.
 */
export async function runConvert(context: CommandContext = {}): Promise<ConvertSummary> {
  const cwd = context.cwd ?? process.cwd();
  const pattern = getMarkdownPattern();
  const summary: ConvertSummary = { converted: [], failed: [] };

  const files = (await glob(pattern, { cwd, nodir: true, dot: true })).sort();
  if (files.length === 0) {
    logger.info(`No ${pattern} files found in the current directory`);
    return summary;
  }

  logger.info(`Found ${files.length} markdown files to process`);
  logger.log(DIVIDER);

  for (const file of files) {
    try {
      const converted = await convertMarkdownFile(file, cwd);
      summary.converted.push(converted);
      logger.success(`Created ${converted.output} with ${converted.patternCount} patterns`);
    } catch (error) {
      summary.failed.push(file);
      logger.error(`Error processing ${file}: ${errorMessage(error)}`);
    }
  }

  logger.log(DIVIDER);
  logger.info(`Successfully created ${summary.converted.length} JSON files`);
  return summary;
}
