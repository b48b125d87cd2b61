import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join, sep } from 'path';
import { PassThrough, Readable } from 'stream';
import type { Request } from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EpubStorageEngine } from './epubStorage.js';
import { DecodeError, ExtensionError, StorageCreateError, StorageWriteError } from './errors.js';
import { nodeFileSystem, type IntakeFileSystem } from './fileSystem.js';

const STAMP = new Date(2024, 0, 5, 7, 8, 9);

function part(originalname: string, stream: Readable): Express.Multer.File {
  return {
    fieldname: 'epub',
    originalname,
    encoding: '7bit',
    mimetype: 'application/epub+zip',
    size: 0,
    stream,
    destination: '',
    filename: '',
    path: '',
    buffer: Buffer.alloc(0),
  };
}

describe('EpubStorageEngine', () => {
  let uploadDir: string;

  beforeEach(async () => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    uploadDir = await mkdtemp(join(tmpdir(), 'epub-intake-storage-'));
  });

  afterEach(async () => {
    await rm(uploadDir, { recursive: true, force: true });
  });

  function engine(fileSystem: IntakeFileSystem = nodeFileSystem) {
    return new EpubStorageEngine({ uploadDir, fileSystem, clock: () => STAMP });
  }

  it('streams the part to <timestamp>_<name> and reports its size', async () => {
    const content = Buffer.from('PK\u0003\u0004 fake epub payload');

    const artifact = await engine().store(part('book.epub', Readable.from([content])));

    expect(artifact).toEqual({
      destination: uploadDir,
      filename: '20240105_070809_book.epub',
      path: join(uploadDir, '20240105_070809_book.epub'),
      size: content.length,
    });
    expect(await readFile(artifact.path)).toEqual(content);
    expect(console.log).toHaveBeenCalledWith(
      `[epub-intake] stored=20240105_070809_book.epub bytes=${content.length}`,
    );
  });

  it('strips directory components from the declared name', async () => {
    const artifact = await engine().store(
      part('../../etc/passwd.epub', Readable.from([Buffer.from('x')])),
    );

    expect(artifact.filename).toBe('20240105_070809_passwd.epub');
    expect(artifact.path.startsWith(uploadDir + sep)).toBe(true);
    expect(await readdir(uploadDir)).toEqual(['20240105_070809_passwd.epub']);
  });

  it('rejects other extensions without touching the disk', async () => {
    const openForWrite = vi.fn(nodeFileSystem.openForWrite);
    const storage = engine({ openForWrite, remove: nodeFileSystem.remove });

    await expect(
      storage.store(part('book.pdf', Readable.from([Buffer.from('%PDF')]))),
    ).rejects.toBeInstanceOf(ExtensionError);
    expect(openForWrite).not.toHaveBeenCalled();
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it('reports a create failure without attempting cleanup', async () => {
    const remove = vi.fn(nodeFileSystem.remove);
    const storage = engine({
      openForWrite: vi.fn().mockRejectedValue(new Error('EACCES: permission denied')),
      remove,
    });

    await expect(
      storage.store(part('book.epub', Readable.from([Buffer.from('x')]))),
    ).rejects.toBeInstanceOf(StorageCreateError);
    expect(remove).not.toHaveBeenCalled();
  });

  it('removes the partial file when the source stream breaks', async () => {
    const source = new PassThrough();
    const pending = engine().store(part('book.epub', source));

    source.write(Buffer.from('first chunk'));
    source.destroy(new Error('client aborted'));

    await expect(pending).rejects.toBeInstanceOf(StorageWriteError);
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it('passes a decoder cut-off through and removes the partial file', async () => {
    const source = new PassThrough();
    const pending = engine().store(part('book.epub', source));
    const cutOff = new DecodeError();

    source.write(Buffer.from('first chunk'));
    source.destroy(cutOff);

    await expect(pending).rejects.toBe(cutOff);
    expect(await readdir(uploadDir)).toEqual([]);
    expect(console.error).not.toHaveBeenCalled();
  });

  it('keeps the write failure when cleanup itself fails', async () => {
    const source = new PassThrough();
    const storage = engine({
      openForWrite: nodeFileSystem.openForWrite,
      remove: vi.fn().mockRejectedValue(new Error('EBUSY')),
    });
    const pending = storage.store(part('book.epub', source));

    source.destroy(new Error('client aborted'));

    await expect(pending).rejects.toBeInstanceOf(StorageWriteError);
    expect(console.error).toHaveBeenCalledWith(
      `[epub-intake] failed to remove partial file path=${join(uploadDir, '20240105_070809_book.epub')}`,
      expect.any(Error),
    );
  });

  it('discards a part that hit the size limit', async () => {
    const source = new PassThrough();
    const pending = engine().store(part('book.epub', source));

    source.emit('limit');
    source.end(Buffer.from('truncated'));

    await expect(pending).rejects.toBeInstanceOf(DecodeError);
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it('removes stored files on request from multer', async () => {
    const artifact = await engine().store(part('book.epub', Readable.from([Buffer.from('x')])));
    const file = { ...part('book.epub', Readable.from([])), path: artifact.path };

    await new Promise<void>((resolve, reject) => {
      engine()._removeFile({} as Request, file, (error) => (error ? reject(error) : resolve()));
    });

    expect(await readdir(uploadDir)).toEqual([]);
  });
});
