import { HttpStatus } from '@nestjs/common';
import { json, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { MALFORMED_JSON_MESSAGE } from '../constants/error-messages.constants';
import '../types/express';
import { isRecord } from '../utils/object.utils';

/**
 * JSON body parser whose parse failures answer with the same structured
 * error body the exception filter produces. Express middleware errors never
 * reach Nest filters, so the mapping has to happen here.
 */
export function createJsonBodyMiddleware(options: { limit: string }): RequestHandler {
  const parse = json({ limit: options.limit });

  return (req: Request, res: Response, next: NextFunction): void => {
    parse(req, res, (error?: unknown) => {
      if (error === undefined || error === null) {
        next();
        return;
      }

      const status = resolveClientErrorStatus(error);
      if (status === undefined) {
        next(error);
        return;
      }

      res.status(status).json({
        ok: false,
        message: status === HttpStatus.BAD_REQUEST ? MALFORMED_JSON_MESSAGE : resolveMessage(error),
        requestId: req.requestId,
      });
    });
  };
}

function resolveClientErrorStatus(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  const status = error.status ?? error.statusCode;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }

  return undefined;
}

function resolveMessage(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }

  return 'Invalid request body.';
}
