import { Router } from 'express';
import { z } from 'zod';
import { HttpError } from '@/utils/errors';
import { asyncHandler } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import type { ModelRegistry } from '../settings/model.registry';
import type { PreferencesStore } from '../settings/preferences.store';

interface SettingsRouterOptions {
  models: Pick<ModelRegistry, 'loadConfig' | 'setSelectedModel'>;
  preferences: Pick<PreferencesStore, 'load' | 'update'>;
  logger: Logger;
}

const selectModelSchema = z.object({
  model: z
    .string({ required_error: 'model is required', invalid_type_error: 'model must be a string' })
    .trim()
    .min(1, 'model is required')
});

const preferencesSchema = z
  .object({
    chat_history_length: z
      .number({ invalid_type_error: 'chat_history_length must be a number' })
      .int('chat_history_length must be an integer')
      .nonnegative('chat_history_length must not be negative')
      .optional(),
    enable_reasoning: z.boolean({ invalid_type_error: 'enable_reasoning must be a boolean' }).optional()
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, 'No preferences given');

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid request body';
}

export function createSettingsRouter({ models, preferences, logger }: SettingsRouterOptions): Router {
  const router = Router();

  router.get(
    '/models',
    asyncHandler(async (_req, res) => {
      res.json(await models.loadConfig());
    })
  );

  router.put(
    '/models/selected',
    asyncHandler(async (req, res) => {
      const parsed = selectModelSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new HttpError(400, firstIssue(parsed.error));
      }

      const { model } = parsed.data;
      if (!(await models.setSelectedModel(model))) {
        throw new HttpError(400, `Unknown model: ${model}`);
      }
      logger.info({ model }, 'Selected model changed');
      res.json(await models.loadConfig());
    })
  );

  router.get(
    '/preferences',
    asyncHandler(async (_req, res) => {
      res.json(await preferences.load());
    })
  );

  router.put(
    '/preferences',
    asyncHandler(async (req, res) => {
      const parsed = preferencesSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new HttpError(400, firstIssue(parsed.error));
      }
      res.json(await preferences.update(parsed.data));
    })
  );

  return router;
}
