import { open, rm } from 'fs/promises';
import type { Writable } from 'stream';

export interface IntakeFileSystem {
  /** Creates (or truncates) the file and resolves once it is open. */
  openForWrite(path: string): Promise<Writable>;
  remove(path: string): Promise<void>;
}

export const nodeFileSystem: IntakeFileSystem = {
  async openForWrite(path: string): Promise<Writable> {
    const handle = await open(path, 'w');
    return handle.createWriteStream();
  },

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  },
};
