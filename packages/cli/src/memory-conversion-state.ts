import type { ConversionStatePort } from '@uplang/core';

export class MemoryConversionState implements ConversionStatePort {
  private readonly mtimes = new Map<string, number>();

  getLastConvertedMtime(id: string): Promise<number | undefined> {
    return Promise.resolve(this.mtimes.get(id));
  }

  setLastConvertedMtime(id: string, mtime: number): Promise<void> {
    this.mtimes.set(id, mtime);
    return Promise.resolve();
  }

  forget(id: string): Promise<void> {
    this.mtimes.delete(id);
    return Promise.resolve();
  }
}
