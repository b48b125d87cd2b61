import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { StorageEngine } from 'multer';
import { Transform, type Writable } from 'stream';
import { DecodeError, IntakeError, MissingFileError } from '../core/errors.js';

export const UPLOAD_FIELD = 'epub';

export interface BoundedUploadOptions {
  storage: StorageEngine;
  maxUploadBytes: number;
}

// multer feeds busboy through `streamHandler` when one is given.
type MeteredOptions = multer.Options & {
  streamHandler?: (req: Request, busboy: Writable) => void;
};

function declaredLength(req: Request): number | undefined {
  const raw = req.header('content-length');
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toDecodeFailure(error: unknown): IntakeError {
  if (error instanceof IntakeError) return error;
  return new DecodeError(error);
}

/**
 * Counts request bytes on their way to busboy and tears the parse down with a
 * `DecodeError` once more than `maxBytes` have arrived.
 */
function createBodyMeter(maxBytes: number, busboy: Writable): Transform {
  let total = 0;
  const meter = new Transform({
    transform(chunk: Buffer, _encoding, done) {
      total += chunk.length;
      if (total > maxBytes) {
        done(new DecodeError());
        return;
      }
      done(null, chunk);
    },
  });
  meter.once('error', (error: Error) => busboy.destroy(error));
  return meter;
}

/**
 * Decodes a multipart body and hands the first `epub` file part to `storage`.
 * Every other part is read and dropped.
 *
 * The whole body is held to `maxUploadBytes`: a larger declared length is
 * turned away unread, and a body that streams past it is cut off, with any
 * file already written for it removed.
 */
export function createBoundedUpload(options: BoundedUploadOptions): RequestHandler {
  const claimed = new WeakSet<Request>();
  const multerOptions: MeteredOptions = {
    storage: options.storage,
    limits: {
      fileSize: options.maxUploadBytes,
      fieldSize: options.maxUploadBytes,
    },
    fileFilter(req, file, accept) {
      if (file.fieldname !== UPLOAD_FIELD || claimed.has(req)) {
        accept(null, false);
        return;
      }
      claimed.add(req);
      accept(null, true);
    },
    streamHandler(req, busboy) {
      req.pipe(createBodyMeter(options.maxUploadBytes, busboy)).pipe(busboy);
    },
  };
  const parse = multer(multerOptions).any();

  return (req: Request, res: Response, next: NextFunction) => {
    const length = declaredLength(req);
    if (length !== undefined && length > options.maxUploadBytes) {
      next(new DecodeError());
      return;
    }

    if (!req.is('multipart/form-data')) {
      next(new DecodeError());
      return;
    }

    parse(req, res, (error?: unknown) => {
      if (error) {
        next(toDecodeFailure(error));
        return;
      }
      const stored = Array.isArray(req.files) ? req.files[0] : undefined;
      if (!stored) {
        next(new MissingFileError());
        return;
      }
      req.file = stored;
      next();
    });
  };
}
