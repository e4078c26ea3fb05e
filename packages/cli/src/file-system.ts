import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FileSystemError } from '@uplang/core';

export interface FileSystem {
  readFile(filePath: string): Promise<Uint8Array>;
  /** Resolves to `undefined` when the file does not exist. */
  readOptionalFile(filePath: string): Promise<Uint8Array | undefined>;
  writeFile(filePath: string, content: string): Promise<void>;
  removeFile(filePath: string): Promise<void>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class NodeFileSystem implements FileSystem {
  async readFile(filePath: string): Promise<Uint8Array> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw new FileSystemError('read', filePath, error);
    }
  }

  async readOptionalFile(filePath: string): Promise<Uint8Array | undefined> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw new FileSystemError('read', filePath, error);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    } catch (error) {
      throw new FileSystemError('mkdir', path.dirname(filePath), error);
    }
    try {
      await fs.writeFile(filePath, content, 'utf-8');
    } catch (error) {
      throw new FileSystemError('write', filePath, error);
    }
  }

  async removeFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      throw new FileSystemError('delete', filePath, error);
    }
  }
}
