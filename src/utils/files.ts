import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Logger } from './logger';
import { isNodeError } from './errors';

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/** Deletes a temporary file; a file that is already gone is not an error. */
export async function removeFile(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.rm(filePath);
    logger.debug({ filePath }, 'Removed temporary file');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return;
    logger.warn({ err, filePath }, 'Failed to remove temporary file');
  }
}

export function expandHome(target: string): string {
  if (target === '~') return os.homedir();
  if (target.startsWith('~/') || target.startsWith('~\\')) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

export function resolveFrom(baseDir: string, target: string): string {
  const expanded = expandHome(target);
  return path.isAbsolute(expanded) ? expanded : path.resolve(baseDir, expanded);
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (err) {
    if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return false;
    throw err;
  }
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch (err) {
    if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return false;
    throw err;
  }
}

/** Resolves `segments` under `root`, or returns null when the result would escape it. */
export function resolveInside(root: string, ...segments: string[]): string | null {
  const base = path.resolve(root);
  const target = path.resolve(base, ...segments);
  return target.startsWith(base + path.sep) ? target : null;
}
