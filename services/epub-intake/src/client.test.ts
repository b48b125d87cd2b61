import { once } from 'events';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import type { Server } from 'http';
import { tmpdir } from 'os';
import { join } from 'path';
import { AuthenticationError, EpubIntake } from 'epub-intake-client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp, createAppContext } from './app.js';

describe('epub-intake-client against the service', () => {
  let uploadDir: string;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    uploadDir = await mkdtemp(join(tmpdir(), 'epub-intake-client-'));
    const ctx = createAppContext(
      { port: 0, apiKey: 'test-secret', uploadDir, maxUploadBytes: 64 * 1024 },
      { clock: () => new Date(2024, 0, 5, 7, 8, 9) },
    );
    server = createApp(ctx).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, 'close');
    await rm(uploadDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('uploads an epub and reads back the same bytes', async () => {
    const content = new TextEncoder().encode('PK fake epub for the round trip');
    const sdk = new EpubIntake({ baseUrl, apiKey: 'test-secret' });

    const result = await sdk.uploads.create({ file: content, filename: 'novel.epub' });

    expect(result).toEqual({ status: 'success', filename: '20240105_070809_novel.epub', size: content.length });
    expect(new Uint8Array(await readFile(join(uploadDir, result.filename)))).toEqual(content);
  });

  it('reports health', async () => {
    await expect(new EpubIntake({ baseUrl }).health()).resolves.toEqual({ status: 'healthy' });
  });

  it('surfaces a rejected key as AuthenticationError', async () => {
    const sdk = new EpubIntake({ baseUrl, apiKey: 'wrong-secret' });

    await expect(
      sdk.uploads.create({ file: new Uint8Array([1, 2]), filename: 'novel.epub' }),
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(await readdir(uploadDir)).toEqual([]);
  });
});
