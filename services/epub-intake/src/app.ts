import express, { type Express } from 'express';
import type { IntakeConfig } from './config.js';
import { nodeFileSystem } from './core/fileSystem.js';
import { intakeErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createHealthRouter } from './routes/health.js';
import { createUploadRouter } from './routes/upload.js';
import type { AppContext } from './types/appContext.js';

export function createAppContext(config: IntakeConfig, overrides: Partial<Omit<AppContext, 'config'>> = {}): AppContext {
  return {
    config,
    fileSystem: overrides.fileSystem ?? nodeFileSystem,
    clock: overrides.clock ?? (() => new Date()),
  };
}

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(createHealthRouter());
  app.use(createUploadRouter(ctx));

  app.use(notFoundHandler);
  app.use(intakeErrorHandler);

  return app;
}

export type { AppContext } from './types/appContext.js';
export type { IntakeConfig } from './config.js';
export type { IntakeFileSystem } from './core/fileSystem.js';
export type { UploadResponse } from './routes/upload.js';
