import fs from 'fs/promises';
import path from 'path';
import { notebookMarkdown } from './notebook';

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set(['md', 'txt', 'ipynb']);

export const DEFAULT_FILE_PREFIX = 'GENERATED_DOC';

export function allowedFile(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return false;
  return ALLOWED_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase());
}

/** Writes the notebook's markdown next to it as `.txt` and returns that path. */
export async function ipynbToText(ipynbPath: string): Promise<string> {
  const text = notebookMarkdown(await fs.readFile(ipynbPath, 'utf8'));
  const txtPath = path.join(path.dirname(ipynbPath), `${path.parse(ipynbPath).name}.txt`);
  await fs.writeFile(txtPath, text, 'utf8');
  return txtPath;
}

const INSTRUCTION_START = /^(Instructions|Note to model|Note|Please):/i;

/**
 * Drops instruction blocks the model echoes back: from a line starting with
 * `Instructions:`, `Note to model:`, `Note:` or `Please:` up to and including the
 * next blank or `---` line.
 */
export function cleanLlmOutput(content: string): string {
  const kept: string[] = [];
  let inInstructions = false;

  for (const line of content.split('\n')) {
    if (INSTRUCTION_START.test(line)) {
      inInstructions = true;
      continue;
    }
    if (inInstructions && (line.trim() === '' || line.startsWith('---'))) {
      inInstructions = false;
      continue;
    }
    if (!inInstructions) {
      kept.push(line);
    }
  }

  return kept.join('\n');
}

export function filePrefix(projectName?: string): string {
  return (projectName || DEFAULT_FILE_PREFIX).replace(/[^\p{L}\p{N}\p{M}_\s]/gu, '').replace(/ /g, '_');
}
