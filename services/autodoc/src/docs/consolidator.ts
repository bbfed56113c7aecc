import fs from 'fs/promises';
import path from 'path';
import ignore, { type Ignore } from 'ignore';
import { isNodeError } from '@/utils/errors';
import type { Logger } from '@/utils/logger';

export interface SizeLimits {
  maxFileSizeKb: number;
  maxTotalSizeMb: number;
}

export interface ConsolidatedProject {
  root: string;
  text: string;
  included: string[];
  skipped: string[];
  totalBytes: number;
}

const KB = 1024;
const MB = 1024 * 1024;

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function convertSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS.slice(0, -1)) {
    if (size < 1024) return `${size.toFixed(2)}${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(2)}${SIZE_UNITS[SIZE_UNITS.length - 1]}`;
}

async function readPatterns(file: string): Promise<string[] | null> {
  try {
    const content = await fs.readFile(file, 'utf8');
    return content.split(/\r?\n/).map((line) => line.trimEnd());
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

interface ProjectFilters {
  excluded: Ignore;
  included: Ignore | null;
}

async function loadFilters(root: string): Promise<ProjectFilters> {
  const excluded = ignore().add('.git');
  const gitignore = await readPatterns(path.join(root, '.gitignore'));
  if (gitignore) excluded.add(gitignore);
  const cfignore = await readPatterns(path.join(root, '.cfignore'));
  if (cfignore) excluded.add(cfignore);

  const cfinclude = await readPatterns(path.join(root, '.cfinclude'));
  const hasIncludes = cfinclude !== null && cfinclude.some((line) => line.trim() !== '');
  return { excluded, included: hasIncludes ? ignore().add(cfinclude) : null };
}

/**
 * Lists the files under `root` in sorted order, honouring `.gitignore` and
 * `.cfignore`. A non-empty `.cfinclude` restricts the result to matching files.
 */
export async function collectProjectFiles(root: string, logger?: Logger): Promise<string[]> {
  const base = path.resolve(root);
  const filters = await loadFilters(base);
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    let names: string[];
    try {
      names = (await fs.readdir(dir)).sort();
    } catch (err) {
      if (isNodeError(err) && (err.code === 'EACCES' || err.code === 'EPERM')) {
        logger?.warn({ dir }, 'Skipping unreadable directory');
        return;
      }
      throw err;
    }

    for (const name of names) {
      const full = path.join(dir, name);
      const rel = path.relative(base, full).split(path.sep).join('/');
      const stat = await fs.stat(full).catch((err: unknown) => {
        if (isNodeError(err) && err.code === 'ENOENT') return null;
        throw err;
      });
      if (!stat) continue;

      if (stat.isDirectory()) {
        if (filters.excluded.ignores(`${rel}/`)) continue;
        await walk(full);
      } else if (stat.isFile()) {
        if (filters.excluded.ignores(rel)) continue;
        if (filters.included && !filters.included.ignores(rel)) continue;
        files.push(full);
      }
    }
  }

  await walk(base);
  return files;
}

function header(root: string): string {
  return (
    `${root}\n\n` +
    'The following content is a collection of files from a project repository. ' +
    'It contains code, documentation, configuration and other text files. ' +
    'Each file is delimited as follows:\n\n' +
    'FILESTART: <file_path>\n<file_content>\nFILESTOP: <file_path>\n\n' +
    'Use all files in this collection to produce high quality documentation.\n\n'
  );
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Concatenates the project's text files between FILESTART/FILESTOP markers. */
export async function consolidateProject(
  root: string,
  limits: SizeLimits,
  logger?: Logger
): Promise<ConsolidatedProject> {
  const base = path.resolve(root);
  const maxFileBytes = limits.maxFileSizeKb * KB;
  const maxTotalBytes = limits.maxTotalSizeMb * MB;
  const included: string[] = [];
  const skipped: string[] = [];
  const parts = [header(base)];
  let totalBytes = 0;

  for (const file of await collectProjectFiles(base, logger)) {
    const { size } = await fs.stat(file);
    if (size > maxFileBytes) {
      logger?.debug({ file, size: convertSize(size), limitKb: limits.maxFileSizeKb }, 'Skipping file above size limit');
      skipped.push(file);
      continue;
    }
    if (totalBytes + size > maxTotalBytes) {
      logger?.info({ file, limitMb: limits.maxTotalSizeMb }, 'Total size limit reached');
      break;
    }

    let content = '';
    try {
      content = utf8.decode(await fs.readFile(file));
    } catch (err) {
      if (!(err instanceof TypeError)) throw err;
      logger?.debug({ file }, 'Skipping content of non UTF-8 file');
      skipped.push(file);
    }

    parts.push(`\nFILESTART: ${file}\n${content}\nFILESTOP: ${file}\n`);
    included.push(file);
    totalBytes += size;
  }

  if (included.length === 0) {
    logger?.warn({ root: base }, 'No project files left after applying size limits');
  }

  return { root: base, text: parts.join(''), included, skipped, totalBytes };
}
