import { Router } from 'express';
import { HttpError } from '@/utils/errors';
import { fileExists, resolveInside } from '@/utils/files';
import { asyncHandler } from '@/utils/http';
import type { Logger } from '@/utils/logger';

export function createDownloadRouter(outputDir: string, logger: Logger): Router {
  const router = Router();

  router.get(
    '/download/:timestamp/:filename',
    asyncHandler(async (req, res, next) => {
      const { timestamp, filename } = req.params;
      const target = resolveInside(outputDir, timestamp, filename);
      if (!target || !(await fileExists(target))) {
        logger.warn({ timestamp, filename }, 'Requested file not found');
        throw new HttpError(404, 'File not found');
      }

      res.attachment(filename);
      res.type('application/octet-stream');
      res.sendFile(target, { dotfiles: 'allow' }, (err?: Error) => {
        if (err) next(err);
      });
    })
  );

  return router;
}
