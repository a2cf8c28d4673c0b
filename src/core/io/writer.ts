import fs from 'fs-extra';
import path from 'path';
import { BACKUP_SUFFIX } from '../config/defaults.js';

export interface WriteOptions {
  /** Copy an existing target aside first (default true) */
  backup?: boolean;
  cwd?: string;
}

export interface WriteResult {
  path: string;
  backupPath?: string;
}

/**
 * First free backup name for target: `<target>.bak`, then `<target>.bak.1`, `.bak.2`, ...
 */
export async function findBackupPath(target: string, cwd: string = process.cwd()): Promise<string> {
  const base = `${target}${BACKUP_SUFFIX}`;
  if (!(await fs.pathExists(path.resolve(cwd, base)))) {
    return base;
  }

  for (let index = 1; ; index++) {
    const candidate = `${base}.${index}`;
    if (!(await fs.pathExists(path.resolve(cwd, candidate)))) {
      return candidate;
    }
  }
}

/**
 * Write a serialized document with a trailing newline in one whole-file write
 */
export async function writeDocument(target: string, content: string, options: WriteOptions = {}): Promise<WriteResult> {
  const cwd = options.cwd ?? process.cwd();
  const absoluteTarget = path.resolve(cwd, target);
  const result: WriteResult = { path: target };

  if (options.backup !== false && (await fs.pathExists(absoluteTarget))) {
    const backupPath = await findBackupPath(target, cwd);
    await fs.copy(absoluteTarget, path.resolve(cwd, backupPath), {
      overwrite: false,
      errorOnExist: true,
      preserveTimestamps: true,
    });
    result.backupPath = backupPath;
  }

  await fs.writeFile(absoluteTarget, `${content}\n`, 'utf-8');
  return result;
}
