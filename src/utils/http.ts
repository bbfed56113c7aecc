import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from './logger';
import { HttpError } from './errors';

/** Shapes an error message into the JSON body a service answers with. */
export type ErrorBody = (message: string) => Record<string, unknown>;

export const detailBody: ErrorBody = (message) => ({ detail: message });

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/** body-parser and friends attach a 4xx `status` to the errors they raise. */
function clientErrorStatus(err: unknown): number | null {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function createErrorHandler(logger: Logger, body: ErrorBody = detailBody): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof HttpError) {
      if (err.status >= 500) {
        logger.error({ err, path: req.path }, err.message);
      }
      res.status(err.status).json(body(err.message));
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== null && err instanceof Error) {
      res.status(status).json(body(err.message));
      return;
    }

    logger.error({ err, path: req.path }, 'Unhandled error');
    res.status(500).json(body('Internal server error'));
  };
}

export function createRequestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info(
        {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start
        },
        'Request completed'
      );
    });
    next();
  };
}
