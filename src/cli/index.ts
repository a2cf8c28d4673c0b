import { Command } from 'commander';
import { DEFAULT_INDENT, getMarkdownPattern } from '../core/config/defaults.js';
import type { MergeCommandInput } from '../core/config/parser.js';
import { runConvert } from './convert-command.js';
import { runMerge } from './merge-command.js';

const MERGE_EXAMPLES = `
Examples:
  $ permkit merge settings1.json settings2.json -o merged.json
  $ permkit merge base.json 'gh-*.json' -o complete-settings.json
  $ permkit merge '*.json' --output final-settings.json`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('permkit')
    .description('Merge and generate permission lists for AI coding assistant settings files')
    .version('0.1.0');

  program
    .command('merge')
    .description('Merge settings files by combining and deduplicating their permission lists')
    .argument('<files...>', 'settings JSON files or glob patterns to merge')
    .option('-o, --output <path>', 'output file path (default: print to stdout)')
    .option('--indent <spaces>', 'JSON indentation spaces', String(DEFAULT_INDENT))
    .option('--compact', 'output compact JSON without indentation')
    .option('--no-backup', 'do not create a .bak backup when the output file exists')
    .option('-f, --force', 'alias for --no-backup')
    .addHelpText('after', MERGE_EXAMPLES)
    .action(async (files: string[], options: MergeCommandInput) => {
      const code = await runMerge(files, options);
      if (code !== 0) {
        process.exit(code);
      }
    });

  program
    .command('convert')
    .description(`Convert ${getMarkdownPattern()} bullet lists in the working directory to permission JSON files`)
    .action(async () => {
      await runConvert();
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
