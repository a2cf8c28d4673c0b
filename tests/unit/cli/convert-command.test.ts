import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { convertMarkdownFile, outputPathFor, runConvert } from '../../../src/cli/convert-command.js';
import { logger } from '../../../src/core/logger.js';

vi.mock('../../../src/core/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), success: vi.fn(), error: vi.fn(), debug: vi.fn(), log: vi.fn() },
}));

describe('outputPathFor', () => {
  it('swaps the extension', () => {
    expect(outputPathFor('gh-issues.md')).toBe('gh-issues.json');
    expect(outputPathFor('docs/gh-pr.md')).toBe(path.join('docs', 'gh-pr.json'));
    expect(outputPathFor('gh-plain')).toBe('gh-plain.json');
  });
});

describe('convert', () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'permkit-convert-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.remove(tempDir);
  });

  it('converts one markdown file into a sibling document', async () => {
    await fs.writeFile(
      path.join(tempDir, 'gh-issues.md'),
      '# Issues\n\n* `Bash(gh issue list)`\n- `Bash(gh issue view:*)` read one issue\n* `Bash(gh issue list)`\n',
    );

    const converted = await convertMarkdownFile('gh-issues.md', tempDir);

    expect(converted).toEqual({ source: 'gh-issues.md', output: 'gh-issues.json', patternCount: 3 });
    await expect(fs.readJson(path.join(tempDir, 'gh-issues.json'))).resolves.toEqual({
      permissions: { allow: ['Bash(gh issue list)', 'Bash(gh issue view:*)'], deny: [] },
    });
  });

  it('processes every matching file and reports the count', async () => {
    await fs.writeFile(path.join(tempDir, 'gh-b.md'), '- `Read`\n');
    await fs.writeFile(path.join(tempDir, 'gh-a.md'), '- `Write`\n');
    await fs.writeFile(path.join(tempDir, 'other.md'), '- `Edit`\n');

    const summary = await runConvert({ cwd: tempDir });

    expect(summary.converted.map((file) => file.output)).toEqual(['gh-a.json', 'gh-b.json']);
    expect(summary.failed).toEqual([]);
    await expect(fs.pathExists(path.join(tempDir, 'other.json'))).resolves.toBe(false);
    expect(logger.success).toHaveBeenCalledWith('Created gh-a.json with 1 patterns');
    expect(logger.info).toHaveBeenCalledWith('Successfully created 2 JSON files');
  });

  it('overwrites earlier output without a backup', async () => {
    await fs.writeFile(path.join(tempDir, 'gh-a.md'), '- `Read`\n');
    await fs.writeFile(path.join(tempDir, 'gh-a.json'), 'stale');

    await runConvert({ cwd: tempDir });

    await expect(fs.readFile(path.join(tempDir, 'gh-a.json'), 'utf-8')).resolves.toBe(
      '{\n  "permissions": {\n    "allow": [\n      "Read"\n    ],\n    "deny": []\n  }\n}\n',
    );
    await expect(fs.pathExists(path.join(tempDir, 'gh-a.json.bak'))).resolves.toBe(false);
  });

  it('continues past a file that fails', async () => {
    await fs.writeFile(path.join(tempDir, 'gh-a.md'), '- `Read`\n');
    await fs.writeFile(path.join(tempDir, 'gh-b.md'), '- `Write`\n');
    // a directory where the output should go makes the write fail
    await fs.mkdir(path.join(tempDir, 'gh-a.json'));

    const summary = await runConvert({ cwd: tempDir });

    expect(summary.failed).toEqual(['gh-a.md']);
    expect(summary.converted.map((file) => file.source)).toEqual(['gh-b.md']);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('Error processing gh-a.md: '));
    expect(logger.info).toHaveBeenCalledWith('Successfully created 1 JSON files');
  });

  it('reports when no markdown files exist', async () => {
    const summary = await runConvert({ cwd: tempDir });

    expect(summary).toEqual({ converted: [], failed: [] });
    expect(logger.info).toHaveBeenCalledWith('No gh-*.md files found in the current directory');
  });

  it('picks up hidden markdown files matching the pattern', async () => {
    vi.stubEnv('PERMKIT_MARKDOWN_PATTERN', '*.md');
    await fs.writeFile(path.join(tempDir, '.private.md'), '- `Read`\n');

    const summary = await runConvert({ cwd: tempDir });

    expect(summary.converted.map((file) => file.output)).toEqual(['.private.json']);
  });

  it('reads the file pattern from the environment', async () => {
    vi.stubEnv('PERMKIT_MARKDOWN_PATTERN', 'perm-*.md');
    await fs.writeFile(path.join(tempDir, 'perm-tools.md'), '* `Bash(make)`\n');
    await fs.writeFile(path.join(tempDir, 'gh-a.md'), '- `Read`\n');

    const summary = await runConvert({ cwd: tempDir });

    expect(summary.converted.map((file) => file.output)).toEqual(['perm-tools.json']);
  });
});
