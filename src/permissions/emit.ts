import { DEFAULT_INDENT } from '../core/config/defaults.js';
import type { PermissionDocument, ResolvedPermissionDocument } from './types.js';

export interface SerializeOptions {
  /** Spaces per level; 0 still breaks lines, without indenting them */
  indent?: number;
  compact?: boolean;
}

/**
 * Wrap a pattern list into a settings document that allows exactly those patterns
 */
export function createPermissionDocument(patterns: readonly string[]): ResolvedPermissionDocument {
  return {
    permissions: {
      allow: [...patterns],
      deny: [],
    },
  };
}

export function serializeDocument(document: PermissionDocument, options: SerializeOptions = {}): string {
  if (options.compact) {
    return JSON.stringify(document);
  }
  return writeValue(document, ' '.repeat(options.indent ?? DEFAULT_INDENT), '');
}

/**
 * Pretty-print with an arbitrary gap. `JSON.stringify` caps its space
 * argument at 10 and drops line breaks for 0.
 */
function writeValue(value: unknown, gap: string, indent: string): string {
  const inner = indent + gap;

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }
    const items = value.map((item: unknown) => writeValue(item, gap, inner));
    return `[\n${inner}${items.join(`,\n${inner}`)}\n${indent}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).filter(([, item]) => item !== undefined);
    if (entries.length === 0) {
      return '{}';
    }
    const members = entries.map(([key, item]) => `${JSON.stringify(key)}: ${writeValue(item, gap, inner)}`);
    return `{\n${inner}${members.join(`,\n${inner}`)}\n${indent}}`;
  }

  return JSON.stringify(value) ?? 'null';
}
