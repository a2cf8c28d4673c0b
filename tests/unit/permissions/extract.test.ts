import { describe, it, expect } from 'vitest';
import {
  collectBulletPatterns,
  extractPatterns,
  matchBulletPattern,
  parseMarkdown,
} from '../../../src/permissions/extract.js';

describe('matchBulletPattern', () => {
  it('matches asterisk and hyphen bullets', () => {
    expect(matchBulletPattern('* `Bash(ls)`')).toBe('Bash(ls)');
    expect(matchBulletPattern('- `Bash(ls)`')).toBe('Bash(ls)');
  });

  it('trims the line first', () => {
    expect(matchBulletPattern('   -   `Read`   ')).toBe('Read');
    expect(matchBulletPattern('\t* `Write`')).toBe('Write');
  });

  it('ignores text after the closing backtick', () => {
    expect(matchBulletPattern('- `Bash(gh pr view:*)` view pull requests')).toBe('Bash(gh pr view:*)');
  });

  it('rejects lines that are not bullet patterns', () => {
    expect(matchBulletPattern('not a bullet')).toBeNull();
    expect(matchBulletPattern('*`Bash(ls)`')).toBeNull();
    expect(matchBulletPattern('- ``')).toBeNull();
    expect(matchBulletPattern('- Bash(ls)')).toBeNull();
    expect(matchBulletPattern('+ `Bash(ls)`')).toBeNull();
    expect(matchBulletPattern('- `unterminated')).toBeNull();
    expect(matchBulletPattern('')).toBeNull();
  });
});

describe('extractPatterns', () => {
  it('extracts bullet patterns in line order', () => {
    const content = '* `Bash(npm run test:*)`\nnot a bullet\n- `Bash(npm run lint)`\n';
    expect(parseMarkdown(content)).toEqual(['Bash(npm run test:*)', 'Bash(npm run lint)']);
  });

  it('keeps one entry for repeated bullets', () => {
    expect(extractPatterns(['- `Read`', '- `Read`'])).toEqual(['Read']);
  });

  it('keeps duplicates when collecting', () => {
    expect(collectBulletPatterns(['- `Read`', '# heading', '* `Read`'])).toEqual(['Read', 'Read']);
  });

  it('handles CRLF line endings', () => {
    expect(parseMarkdown('# GitHub\r\n\r\n- `Bash(gh issue list)`\r\n- `Bash(gh pr list)`\r\n')).toEqual([
      'Bash(gh issue list)',
      'Bash(gh pr list)',
    ]);
  });

  it('returns an empty list for a document without bullets', () => {
    expect(parseMarkdown('# Title\n\nSome prose.\n')).toEqual([]);
  });
});
