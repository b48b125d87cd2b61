import { resolve, sep } from 'path';
import { InvalidFilenameError } from './errors.js';

export const ALLOWED_EXTENSION = '.epub';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function hasAllowedExtension(filename: string): boolean {
  return filename.toLowerCase().endsWith(ALLOWED_EXTENSION);
}

/** Last path segment of a client-supplied name, for either separator style. */
export function stripDirectories(filename: string): string {
  const segments = filename.replace(/[\\/]+$/, '').split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

export function deriveStoredName(originalName: string, now: Date): string {
  return `${formatTimestamp(now)}_${stripDirectories(originalName)}`;
}

/**
 * Joins a stored name onto the upload root.
 * @throws InvalidFilenameError when the result would land outside the root
 */
export function resolveInsideRoot(rootDir: string, storedName: string): string {
  const root = resolve(rootDir);
  const destination = resolve(root, storedName);
  const prefix = root.endsWith(sep) ? root : root + sep;
  if (!destination.startsWith(prefix)) {
    throw new InvalidFilenameError();
  }
  return destination;
}
