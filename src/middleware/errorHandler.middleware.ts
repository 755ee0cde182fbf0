import { Request, Response, NextFunction } from 'express';
import { toErrorResponse } from '../transformers/responseEnvelope';

/** body-parser tags its failures with an HTTP status and a `type` string */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json(toErrorResponse('Not found'));
}

/**
 * Final error handler. Routes answer their own 400/502/500s; this catches what
 * escapes them: malformed JSON bodies and rejections forwarded by asyncHandler.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json(toErrorResponse(status === 413 ? 'Request body too large' : 'Invalid request body'));
    return;
  }

  console.error('Unhandled error:', err);
  res.status(500).json(toErrorResponse('Internal server error. Please try again later.'));
}
