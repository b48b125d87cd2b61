import { Router } from 'express';
import { EpubStorageEngine } from '../core/epubStorage.js';
import { MissingFileError } from '../core/errors.js';
import { createBoundedUpload } from '../middleware/boundedUpload.js';
import { createQueryApiKeyMiddleware, requirePost } from '../middleware/gatekeeper.js';
import type { AppContext } from '../types/appContext.js';

export interface UploadResponse {
  status: 'success';
  filename: string;
  size: number;
}

export function createUploadRouter(ctx: AppContext): Router {
  const router = Router();
  const storage = new EpubStorageEngine({
    uploadDir: ctx.config.uploadDir,
    fileSystem: ctx.fileSystem,
    clock: ctx.clock,
  });

  router.all(
    '/upload',
    requirePost,
    createQueryApiKeyMiddleware(ctx.config.apiKey),
    createBoundedUpload({ storage, maxUploadBytes: ctx.config.maxUploadBytes }),
    (req, res, next) => {
      const file = req.file;
      if (!file) {
        next(new MissingFileError());
        return;
      }

      const body: UploadResponse = {
        status: 'success',
        filename: file.filename,
        size: file.size,
      };
      res.json(body);
    },
  );

  return router;
}
