import fs from 'fs-extra';
import path from 'path';
import type { ZodIssue } from 'zod';
import { PermissionDocumentSchema, type PermissionDocument } from '../../permissions/types.js';
import { SettingsError, SettingsErrorCode, errorMessage, isErrnoException } from '../errors/index.js';

export interface LoadOptions {
  /** Directory relative paths are resolved against */
  cwd?: string;
}

/**
 * Read and validate one settings file.
 *
 * Error messages name the path as the caller gave it, not the resolved one.
 */
export async function loadSettingsFile(filePath: string, options: LoadOptions = {}): Promise<PermissionDocument> {
  const absolutePath = path.resolve(options.cwd ?? process.cwd(), filePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new SettingsError(`File '${filePath}' not found`, SettingsErrorCode.FILE_NOT_FOUND, {
        filePath,
        suggestion: 'Check the path, or quote glob patterns so they are expanded relative to the working directory.',
      });
    }
    throw new SettingsError(`Error reading '${filePath}': ${errorMessage(error)}`, SettingsErrorCode.READ_FAILED, {
      filePath,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SettingsError(`Invalid JSON in '${filePath}': ${errorMessage(error)}`, SettingsErrorCode.INVALID_JSON, {
      filePath,
      suggestion: 'Check the settings file syntax.',
    });
  }

  const result = PermissionDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new SettingsError(
      `Invalid settings in '${filePath}': ${formatIssue(result.error.issues[0])}`,
      SettingsErrorCode.INVALID_SHAPE,
      { filePath, suggestion: 'permissions.allow and permissions.deny must be arrays of strings.' },
    );
  }

  return result.data;
}

/**
 * Load files in order, stopping at the first one that fails
 */
export async function loadSettingsFiles(
  filePaths: readonly string[],
  options: LoadOptions = {},
): Promise<PermissionDocument[]> {
  const documents: PermissionDocument[] = [];
  for (const filePath of filePaths) {
    documents.push(await loadSettingsFile(filePath, options));
  }
  return documents;
}

function formatIssue(issue: ZodIssue | undefined): string {
  if (!issue) {
    return 'unexpected structure';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
