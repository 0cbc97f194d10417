import { randomUUID } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '../core/errors/base-error.js';
import { ConflictError } from '../core/errors/conflict.error.js';
import { ValidationError } from '../core/errors/validation.error.js';
import { logger } from '../utils/logger.js';

interface ErrorPayload {
  message: string;
  code: string;
  traceId: string;
  field?: string;
  data?: unknown;
}

export const errorMiddleware = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();
  const status = err instanceof BaseError ? err.status : 500;
  const payload: ErrorPayload = {
    message: status >= 500 && !(err instanceof BaseError) ? 'Internal error' : err.message,
    code: err instanceof BaseError ? err.code : 'INTERNAL',
    traceId,
  };

  if (err instanceof ValidationError && err.field) payload.field = err.field;
  if (err instanceof ConflictError && err.data !== undefined) payload.data = err.data;

  if (status >= 500) {
    logger.error({ traceId, path: req.path, err }, '[http] request failed');
  } else {
    logger.warn({ traceId, path: req.path, code: payload.code }, '[http] request rejected');
  }

  res.status(status).json(payload);
};
