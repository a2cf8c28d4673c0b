import { z } from 'zod';
import { SettingsError, SettingsErrorCode } from '../errors/index.js';
import { DEFAULT_INDENT } from './defaults.js';

/**
 * Options of the `merge` command as commander hands them over.
 * `backup` is false when `--no-backup` is given; `force` is its alias.
 */
export const MergeOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  indent: z
    .union([z.string(), z.number()])
    .default(DEFAULT_INDENT)
    .pipe(z.coerce.number().int().min(0)),
  compact: z.boolean().default(false),
  backup: z.boolean().default(true),
  force: z.boolean().default(false),
});

export type MergeCommandInput = z.input<typeof MergeOptionsSchema>;
export type MergeOptions = z.output<typeof MergeOptionsSchema>;

export function parseMergeOptions(input: MergeCommandInput): MergeOptions {
  const result = MergeOptionsSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const option = issue?.path[0] ?? 'options';
  throw new SettingsError(
    `Invalid option --${String(option)}: ${issue?.message ?? 'invalid value'}`,
    SettingsErrorCode.INVALID_OPTION,
    { suggestion: 'Run with --help to see the accepted options.' },
  );
}

/**
 * Whether the existing output file should be copied aside before it is replaced
 */
export function shouldBackup(options: MergeOptions): boolean {
  return options.backup && !options.force;
}
