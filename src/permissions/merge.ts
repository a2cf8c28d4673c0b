import { SettingsError, SettingsErrorCode } from '../core/errors/index.js';
import { dedupePatterns } from './dedupe.js';
import {
  PERMISSION_LIST_NAMES,
  type PermissionDocument,
  type PermissionListName,
  type ResolvedPermissionDocument,
} from './types.js';

/**
 * Merge settings documents
 * - permissions.allow / permissions.deny: concatenated in input order, duplicates dropped
 * - everything else: taken from the first document only
 *
 * This is a two-field overlay on a shallow copy, not a deep merge.
 */
export function mergeSettings(documents: readonly PermissionDocument[]): ResolvedPermissionDocument {
  if (documents.length === 0) {
    throw new SettingsError('No files provided to merge', SettingsErrorCode.NO_INPUT);
  }

  const base = documents[0];

  return {
    ...base,
    permissions: {
      ...(base.permissions ?? {}),
      allow: mergeList(documents, 'allow'),
      deny: mergeList(documents, 'deny'),
    },
  };
}

function mergeList(documents: readonly PermissionDocument[], name: PermissionListName): string[] {
  const lists: string[][] = [];

  for (const document of documents) {
    const list = document.permissions?.[name];
    if (list) {
      lists.push(list);
    }
  }

  return dedupePatterns(lists);
}

/**
 * Count the patterns of each list, for status output
 */
export function countPatterns(document: ResolvedPermissionDocument): Record<PermissionListName, number> {
  const counts = { allow: 0, deny: 0 };
  for (const name of PERMISSION_LIST_NAMES) {
    counts[name] = document.permissions[name].length;
  }
  return counts;
}
