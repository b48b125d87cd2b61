import 'dotenv/config';
import { resolve } from 'path';

export const DEFAULT_PORT = 8080;
export const DEFAULT_UPLOAD_DIR = '/app/uploads';
export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export interface IntakeConfig {
  readonly port: number;
  readonly apiKey: string;
  readonly uploadDir: string;
  readonly maxUploadBytes: number;
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IntakeConfig {
  const apiKey = env.API_KEY || '';
  if (!apiKey) {
    throw new Error('API_KEY environment variable is required');
  }

  return Object.freeze({
    port: intFromEnv(env, 'PORT', DEFAULT_PORT),
    apiKey,
    uploadDir: resolve(env.UPLOAD_DIR || DEFAULT_UPLOAD_DIR),
    maxUploadBytes: MAX_UPLOAD_BYTES,
  });
}

/** Keeps the first and last four characters of a key for startup logs. */
export function maskApiKey(key: string): string {
  if (key.length <= 8) return '****';
  return `${key.slice(0, 4)}${'*'.repeat(key.length - 8)}${key.slice(-4)}`;
}
