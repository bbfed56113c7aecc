import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { collectProjectFiles, consolidateProject, convertSize } from '../../src/docs/consolidator';
import { createProject, removeProject } from '../fixtures/project';

describe('convertSize', () => {
  it('formats bytes with two decimals', () => {
    expect(convertSize(512)).toBe('512.00B');
    expect(convertSize(1536)).toBe('1.50KB');
    expect(convertSize(5 * 1024 * 1024)).toBe('5.00MB');
  });
});

describe('project consolidation', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) await removeProject(root);
    root = undefined;
  });

  const projectFiles = {
    '.gitignore': 'node_modules\n*.log\n',
    '.git/HEAD': 'ref: refs/heads/main\n',
    'README.md': '# Demo',
    'big.txt': 'a'.repeat(2048),
    'debug.log': 'noise',
    'image.bin': Buffer.from([0xff, 0xfe, 0x00]),
    'node_modules/pkg/index.js': 'module.exports = 1;',
    'src/index.ts': 'export const x = 1;'
  };

  it('walks the tree in order and honours .gitignore', async () => {
    root = await createProject(projectFiles);

    const files = await collectProjectFiles(root);

    expect(files.map((file) => path.relative(root ?? '', file).split(path.sep).join('/'))).toEqual([
      '.gitignore',
      'README.md',
      'big.txt',
      'image.bin',
      'src/index.ts'
    ]);
  });

  it('keeps only .cfinclude matches and drops .cfignore matches', async () => {
    root = await createProject({
      '.cfinclude': '*.md\n',
      '.cfignore': 'drafts/\n',
      'README.md': '# Demo',
      'docs/guide.md': 'Guide',
      'drafts/notes.md': 'wip',
      'src/index.ts': 'export {};'
    });

    const files = await collectProjectFiles(root);

    expect(files).toEqual([path.join(root, 'README.md'), path.join(root, 'docs', 'guide.md')]);
  });

  it('ignores an empty .cfinclude', async () => {
    root = await createProject({ '.cfinclude': '', 'a.txt': 'a' });

    const files = await collectProjectFiles(root);

    expect(files).toEqual([path.join(root, '.cfinclude'), path.join(root, 'a.txt')]);
  });

  it('skips oversized files and the content of binary files', async () => {
    root = await createProject(projectFiles);

    const result = await consolidateProject(root, { maxFileSizeKb: 1, maxTotalSizeMb: 1 });

    const readme = path.join(root, 'README.md');
    const image = path.join(root, 'image.bin');
    expect(result.included).toEqual([
      path.join(root, '.gitignore'),
      readme,
      image,
      path.join(root, 'src', 'index.ts')
    ]);
    expect(result.skipped).toEqual([path.join(root, 'big.txt'), image]);
    expect(result.text.startsWith(`${root}\n\n`)).toBe(true);
    expect(result.text).toContain(`\nFILESTART: ${readme}\n# Demo\nFILESTOP: ${readme}\n`);
    expect(result.text).toContain(`\nFILESTART: ${image}\n\nFILESTOP: ${image}\n`);
    expect(result.totalBytes).toBe(19 + 6 + 3 + 19);
  });

  it('stops before the total size limit is exceeded', async () => {
    root = await createProject(projectFiles);

    const result = await consolidateProject(root, { maxFileSizeKb: 100, maxTotalSizeMb: 20 / (1024 * 1024) });

    expect(result.included).toEqual([path.join(root, '.gitignore')]);
    expect(result.totalBytes).toBe(19);
  });
});
