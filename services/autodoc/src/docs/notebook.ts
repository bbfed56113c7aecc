import crypto from 'crypto';
import { z } from 'zod';

const cellSchema = z.object({
  cell_type: z.string(),
  source: z.union([z.string(), z.array(z.string())]).default('')
});

const notebookSchema = z.object({
  cells: z.array(cellSchema).default([])
});

export interface MarkdownCell {
  cell_type: 'markdown';
  id: string;
  metadata: Record<string, never>;
  source: string;
}

export interface Notebook {
  cells: MarkdownCell[];
  metadata: Record<string, never>;
  nbformat: 4;
  nbformat_minor: 5;
}

/** A v4.5 notebook holding `markdown` as its single cell. */
export function createMarkdownNotebook(markdown: string): Notebook {
  return {
    cells: [
      {
        cell_type: 'markdown',
        id: crypto.randomBytes(4).toString('hex'),
        metadata: {},
        source: markdown
      }
    ],
    metadata: {},
    nbformat: 4,
    nbformat_minor: 5
  };
}

export function serializeNotebook(notebook: Notebook): string {
  return `${JSON.stringify(notebook, null, 1)}\n`;
}

/** Concatenates the markdown cells, each followed by a blank line. */
export function notebookMarkdown(raw: string): string {
  const notebook = notebookSchema.parse(JSON.parse(raw));
  return notebook.cells
    .filter((cell) => cell.cell_type === 'markdown')
    .map((cell) => `${Array.isArray(cell.source) ? cell.source.join('') : cell.source}\n\n`)
    .join('');
}
