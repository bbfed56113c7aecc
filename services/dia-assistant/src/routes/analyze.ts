import { Router } from 'express';
import type multer from 'multer';
import { z } from 'zod';
import { HttpError, errorMessage } from '@/utils/errors';
import { removeFile } from '@/utils/files';
import { asyncHandler } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import { formatTimestamp } from '@/utils/timestamps';
import { acceptSingleFile, formField } from '@/utils/uploads';
import type { DiaAnalyzer } from '../dia/analyzer.service';

interface AnalyzeRouterOptions {
  analyzer: Pick<DiaAnalyzer, 'process'>;
  upload: multer.Multer;
  logger: Logger;
}

const textBodySchema = z.object({
  text_input: z
    .string({ required_error: 'text_input is required', invalid_type_error: 'text_input must be a string' })
    .trim()
    .min(1, 'text_input is required')
});

export const MISSING_INPUT = 'Either file or text input must be provided';

export function createAnalyzeRouter({ analyzer, upload, logger }: AnalyzeRouterOptions): Router {
  const router = Router();

  async function analyze(requestId: string, filePath: string | undefined, text: string | undefined) {
    const start = Date.now();
    logger.info({ requestId }, 'Starting DIA analysis');
    try {
      const result = await analyzer.process(filePath, text);
      logger.info(
        { requestId, processingTimeSec: (Date.now() - start) / 1000, resultLength: result.length },
        'DIA analysis completed'
      );
      return result;
    } catch (err) {
      logger.error({ requestId, err }, 'DIA analysis failed');
      throw new HttpError(500, `Error processing request: ${errorMessage(err)}`);
    } finally {
      if (filePath) {
        await removeFile(filePath, logger);
      }
    }
  }

  router.post(
    '/analyze',
    acceptSingleFile(upload, 'file'),
    asyncHandler(async (req, res) => {
      const requestId = formatTimestamp(new Date(), { micros: true });
      const text = formField(req.body, 'text_input');
      const file = req.file;

      logger.info(
        {
          requestId,
          fileName: file?.originalname,
          fileSize: file?.size,
          textLength: text?.length ?? 0
        },
        'DIA analysis request received'
      );

      if (!file && !text) {
        logger.warn({ requestId }, 'Request rejected: no file or text input provided');
        throw new HttpError(400, MISSING_INPUT);
      }

      const result = await analyze(requestId, file?.path, text);
      res.json({ result });
    })
  );

  router.post(
    '/analyze-text',
    asyncHandler(async (req, res) => {
      const requestId = formatTimestamp(new Date(), { micros: true });
      const parsed = textBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new HttpError(400, parsed.error.issues[0]?.message ?? 'Invalid request body');
      }

      logger.info({ requestId, textLength: parsed.data.text_input.length }, 'DIA text analysis request received');
      const result = await analyze(requestId, undefined, parsed.data.text_input);
      res.json({ result });
    })
  );

  return router;
}
