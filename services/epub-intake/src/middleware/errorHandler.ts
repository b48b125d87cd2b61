import type { NextFunction, Request, Response } from 'express';
import { IntakeError, NotFoundError } from '../core/errors.js';

export function sendError(res: Response, error: IntakeError) {
  res.status(error.statusCode).json({
    error: {
      code: error.code,
      message: error.message,
    },
  });
}

export function notFoundHandler(req: Request, res: Response) {
  sendError(res, new NotFoundError(req.method, req.path));
}

/**
 * Final error middleware. Storage failures have already been logged with
 * their cause where they happened; only the client-safe message leaves here.
 */
export function intakeErrorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  if (!(error instanceof IntakeError)) {
    console.error(`[epub-intake] unhandled error method=${req.method} path=${req.path}`, error);
  }
  if (res.headersSent) return;

  sendError(
    res,
    error instanceof IntakeError ? error : new IntakeError('Internal server error', 'INTERNAL_ERROR', 500),
  );
}
