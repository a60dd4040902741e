/**
 * MirrorFilesystem backed by node:fs/promises.
 */

import * as fs from 'node:fs/promises';
import type { DestinationFile, MirrorFilesystem } from './types.js';

class LocalDestinationFile implements DestinationFile {
  readonly path: string;
  private readonly handle: fs.FileHandle;
  private closed = false;

  constructor(filePath: string, handle: fs.FileHandle) {
    this.path = filePath;
    this.handle = handle;
  }

  async write(chunk: Uint8Array, position: number): Promise<void> {
    let offset = 0;
    while (offset < chunk.byteLength) {
      const { bytesWritten } = await this.handle.write(
        chunk,
        offset,
        chunk.byteLength - offset,
        position + offset
      );
      offset += bytesWritten;
    }
  }

  async reset(): Promise<void> {
    await this.handle.truncate(0);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

export class LocalFilesystem implements MirrorFilesystem {
  async createDirectories(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }

  async openDestination(filePath: string): Promise<DestinationFile> {
    // 'w' creates or truncates
    const handle = await fs.open(filePath, 'w');
    return new LocalDestinationFile(filePath, handle);
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
