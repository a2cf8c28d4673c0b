import { dedupePatterns } from './dedupe.js';

/**
 * A bullet (`*` or `-`), whitespace, then a backtick-quoted pattern.
 * Text after the closing backtick is ignored.
 */
const BULLET_PATTERN = /^[*-]\s+`([^`]+)`/;

/**
 * Return the quoted pattern of a bullet line, or null for any other line
 */
export function matchBulletPattern(line: string): string | null {
  const match = BULLET_PATTERN.exec(line.trim());
  return match?.[1] ?? null;
}

/**
 * Collect every bullet pattern in line order, duplicates included
 */
export function collectBulletPatterns(lines: Iterable<string>): string[] {
  const patterns: string[] = [];

  for (const line of lines) {
    const pattern = matchBulletPattern(line);
    if (pattern !== null) {
      patterns.push(pattern);
    }
  }

  return patterns;
}

/**
 * Extract the unique bullet patterns of a document. Lines that are not
 * bullets are skipped, never reported.
 */
export function extractPatterns(lines: Iterable<string>): string[] {
  return dedupePatterns([collectBulletPatterns(lines)]);
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

export function parseMarkdown(content: string): string[] {
  return extractPatterns(splitLines(content));
}
