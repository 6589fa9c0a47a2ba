import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isPipelineError } from '@trip-carbon/domain';
import type { PipelineErrorCode } from '@trip-carbon/domain';

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  CONFIGURATION: 400,
  NOT_FOUND: 404,
  LOAD_ERROR: 422,
  COORDINATE_RANGE: 422,
};

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (isPipelineError(err)) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code, details: err.details });
    return;
  }
  if (err instanceof Error) {
    // body-parser and friends attach an HTTP status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[api] unhandled error', err);
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
