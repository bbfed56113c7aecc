import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { isNodeError } from '@/utils/errors';
import { ensureDir } from '@/utils/files';
import type { Logger } from '@/utils/logger';

const catalogSchema = z.object({
  defaultModel: z.string().min(1),
  models: z.record(z.string().min(1))
});

export type ModelCatalog = z.infer<typeof catalogSchema>;

const modelConfigSchema = z.object({
  selected_model: z.string(),
  available_models: z.array(z.string()).default([])
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

interface ModelRegistryOptions {
  catalog: ModelCatalog;
  preferencesDir: string;
  /** Used for every model when set. */
  workflowOverride?: string;
  logger?: Logger;
}

/**
 * Maps model names to platform workflow ids and keeps the user's model choice in
 * `<preferencesDir>/model_config.json`.
 */
export class ModelRegistry {
  private readonly configPath: string;

  constructor(private readonly options: ModelRegistryOptions) {
    this.configPath = path.join(options.preferencesDir, 'model_config.json');
  }

  static async fromFile(modelsFile: string, options: Omit<ModelRegistryOptions, 'catalog'>): Promise<ModelRegistry> {
    const raw: unknown = JSON.parse(await fs.readFile(modelsFile, 'utf8'));
    return new ModelRegistry({ ...options, catalog: catalogSchema.parse(raw) });
  }

  get availableModels(): string[] {
    return Object.keys(this.options.catalog.models);
  }

  private defaultConfig(): ModelConfig {
    return { selected_model: this.options.catalog.defaultModel, available_models: this.availableModels };
  }

  private async save(config: ModelConfig): Promise<void> {
    await ensureDir(this.options.preferencesDir);
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 4), 'utf8');
  }

  async loadConfig(): Promise<ModelConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, 'utf8');
    } catch (err) {
      if (!isNodeError(err) || err.code !== 'ENOENT') throw err;
      const config = this.defaultConfig();
      await this.save(config);
      return config;
    }

    const parsed = modelConfigSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      this.options.logger?.warn({ path: this.configPath }, 'Invalid model configuration, using defaults');
      return this.defaultConfig();
    }

    const available = this.availableModels;
    const selected = available.includes(parsed.data.selected_model)
      ? parsed.data.selected_model
      : this.options.catalog.defaultModel;
    return { selected_model: selected, available_models: available };
  }

  async selectedModel(): Promise<string> {
    return (await this.loadConfig()).selected_model;
  }

  async setSelectedModel(model: string): Promise<boolean> {
    const config = await this.loadConfig();
    if (!config.available_models.includes(model)) return false;
    await this.save({ ...config, selected_model: model });
    return true;
  }

  workflowIdFor(model: string): string | undefined {
    return this.options.workflowOverride ?? this.options.catalog.models[model];
  }
}
