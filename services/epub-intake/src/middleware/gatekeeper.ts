import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { AuthError, MethodError } from '../core/errors.js';

export const API_KEY_PARAM = 'api_key';

function secureCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

function firstQueryValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return '';
}

export function requirePost(req: Request, res: Response, next: NextFunction) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    next(new MethodError());
    return;
  }
  next();
}

/**
 * Checks `?api_key=` against the configured secret before anything reads
 * the request body.
 */
export function createQueryApiKeyMiddleware(apiKey: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const incoming = firstQueryValue(req.query[API_KEY_PARAM]);
    if (!incoming || !secureCompare(incoming, apiKey)) {
      next(new AuthError());
      return;
    }

    next();
  };
}
