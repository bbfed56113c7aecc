import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { isNodeError } from '@/utils/errors';
import { ensureDir } from '@/utils/files';
import type { Logger } from '@/utils/logger';

export interface Preferences {
  chat_history_length: number;
  enable_reasoning: boolean;
}

export const DEFAULT_PREFERENCES: Readonly<Preferences> = {
  chat_history_length: 10,
  enable_reasoning: true
};

// Values of the wrong type are treated like missing keys.
const storedSchema = z
  .object({
    chat_history_length: z.number().int().nonnegative().optional().catch(undefined),
    enable_reasoning: z.boolean().optional().catch(undefined)
  })
  .passthrough();

export class PreferencesStore {
  private readonly file: string;

  constructor(
    private readonly dir: string,
    private readonly logger?: Logger
  ) {
    this.file = path.join(dir, 'config.json');
  }

  private async readStored(): Promise<Record<string, unknown> | null> {
    try {
      const raw: unknown = JSON.parse(await fs.readFile(this.file, 'utf8'));
      return typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? { ...raw } : {};
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  private async write(values: Record<string, unknown>): Promise<void> {
    await ensureDir(this.dir);
    await fs.writeFile(this.file, JSON.stringify(values, null, 4), 'utf8');
  }

  /** Reads the stored preferences, writing back any defaults that were missing. */
  async load(): Promise<Preferences> {
    const stored = await this.readStored();
    if (stored === null) {
      await this.write({ ...DEFAULT_PREFERENCES });
      return { ...DEFAULT_PREFERENCES };
    }

    const parsed = storedSchema.parse(stored);
    const preferences: Preferences = {
      chat_history_length: parsed.chat_history_length ?? DEFAULT_PREFERENCES.chat_history_length,
      enable_reasoning: parsed.enable_reasoning ?? DEFAULT_PREFERENCES.enable_reasoning
    };

    const missing = Object.keys(DEFAULT_PREFERENCES).filter((key) => !(key in stored));
    if (missing.length > 0) {
      this.logger?.info({ missing }, 'Adding default preferences');
      await this.write({ ...stored, ...preferences });
    }
    return preferences;
  }

  /** Applies the given changes; keys the store does not know are kept as they are in the file. */
  async update(changes: Partial<Preferences>): Promise<Preferences> {
    const current = await this.load();
    const stored = (await this.readStored()) ?? {};
    const next: Preferences = {
      chat_history_length: changes.chat_history_length ?? current.chat_history_length,
      enable_reasoning: changes.enable_reasoning ?? current.enable_reasoning
    };
    await this.write({ ...stored, ...next });
    this.logger?.info({ preferences: next }, 'Preferences updated');
    return next;
  }
}
