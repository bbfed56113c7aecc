import crypto from 'crypto';
import path from 'path';
import type { RequestHandler } from 'express';
import multer from 'multer';
import { HttpError, errorMessage } from './errors';

const MB = 1024 * 1024;

/** Writes uploads into `dir` under a random name that keeps the original extension. */
export function createDiskUpload(dir: string, maxFileSizeMb: number): multer.Multer {
  return multer({
    storage: multer.diskStorage({
      destination: dir,
      filename: (_req, file, cb) => {
        const suffix = path.extname(file.originalname);
        cb(null, `upload_${Date.now()}_${crypto.randomBytes(6).toString('hex')}${suffix}`);
      }
    }),
    limits: { fileSize: maxFileSizeMb * MB }
  });
}

export function createMemoryUpload(maxFileSizeMb: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileSizeMb * MB }
  });
}

/**
 * Wraps `upload.single(field)` so that rejected uploads surface as HttpErrors:
 * 400 for malformed or oversized uploads, 500 when the file cannot be stored.
 */
export function acceptSingleFile(upload: multer.Multer, field: string): RequestHandler {
  const handler = upload.single(field);
  return (req, res, next) => {
    handler(req, res, (err?: unknown) => {
      if (!err) {
        next();
        return;
      }
      if (err instanceof multer.MulterError) {
        next(new HttpError(400, `Invalid upload: ${err.message}`));
        return;
      }
      next(new HttpError(500, `Error processing file upload: ${errorMessage(err)}`));
    });
  };
}

/** Reads a multipart text field; blank values count as absent. */
export function formField(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, name);
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  return value;
}
