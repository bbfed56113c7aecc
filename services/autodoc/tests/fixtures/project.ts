import fs from 'fs/promises';
import os from 'os';
import path from 'path';

/** Creates a throwaway project tree; keys are POSIX paths relative to the root. */
export async function createProject(files: Record<string, string | Buffer>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'autodoc-project-'));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, ...relative.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
  return root;
}

export async function removeProject(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}
