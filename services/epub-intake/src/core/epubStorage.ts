import type { Request } from 'express';
import type { StorageEngine } from 'multer';
import { Transform, type Writable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  DecodeError,
  ExtensionError,
  IntakeError,
  StorageCreateError,
  StorageWriteError,
} from './errors.js';
import type { IntakeFileSystem } from './fileSystem.js';
import { deriveStoredName, hasAllowedExtension, resolveInsideRoot } from './naming.js';

export interface EpubStorageOptions {
  uploadDir: string;
  fileSystem: IntakeFileSystem;
  clock: () => Date;
}

export interface StoredArtifact {
  destination: string;
  filename: string;
  path: string;
  size: number;
}

/**
 * Multer storage engine that validates the declared name and streams the
 * part straight to `<uploadDir>/<timestamp>_<basename>`.
 *
 * Every exit path either consumes the part stream or lets pipeline destroy it,
 * and a copy that fails midway never leaves its file behind.
 */
export class EpubStorageEngine implements StorageEngine {
  constructor(private readonly options: EpubStorageOptions) {}

  _handleFile(
    _req: Request,
    file: Express.Multer.File,
    callback: (error?: unknown, info?: Partial<Express.Multer.File>) => void,
  ): void {
    this.store(file).then(
      (artifact) => callback(null, artifact),
      (error: unknown) => callback(error),
    );
  }

  _removeFile(
    _req: Request,
    file: Express.Multer.File,
    callback: (error: Error | null) => void,
  ): void {
    if (!file.path) {
      callback(null);
      return;
    }
    void this.discard(file.path).then(() => callback(null));
  }

  async store(file: Express.Multer.File): Promise<StoredArtifact> {
    let truncated = false;
    let streamError: Error | undefined;
    file.stream.once('limit', () => {
      truncated = true;
    });
    // The part may fail while the destination is still being opened.
    file.stream.once('error', (error: Error) => {
      streamError = error;
    });

    if (!hasAllowedExtension(file.originalname)) {
      file.stream.resume();
      throw new ExtensionError();
    }

    const filename = deriveStoredName(file.originalname, this.options.clock());
    let path: string;
    try {
      path = resolveInsideRoot(this.options.uploadDir, filename);
    } catch (error) {
      file.stream.resume();
      throw error;
    }

    let target: Writable;
    try {
      target = await this.options.fileSystem.openForWrite(path);
    } catch (error) {
      file.stream.resume();
      console.error(`[epub-intake] failed to create destination file path=${path}`, error);
      throw new StorageCreateError(error);
    }

    let size = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, done) {
        size += chunk.length;
        done(null, chunk);
      },
    });

    try {
      if (streamError) throw streamError;
      await pipeline(file.stream, counter, target);
    } catch (error) {
      target.destroy();
      // A body cut off by the decoder keeps its own error.
      if (error instanceof IntakeError) {
        await this.discard(path);
        throw error;
      }
      console.error(`[epub-intake] failed to copy file stored=${filename} bytes=${size}`, error);
      await this.discard(path);
      throw new StorageWriteError(error);
    }

    if (truncated) {
      await this.discard(path);
      throw new DecodeError();
    }

    console.log(`[epub-intake] stored=${filename} bytes=${size}`);
    return { destination: this.options.uploadDir, filename, path, size };
  }

  private async discard(path: string): Promise<void> {
    try {
      await this.options.fileSystem.remove(path);
    } catch (error) {
      console.error(`[epub-intake] failed to remove partial file path=${path}`, error);
    }
  }
}
