export interface ConversionStatePort {
  getLastConvertedMtime(id: string): Promise<number | undefined>;
  setLastConvertedMtime(id: string, mtime: number): Promise<void>;
  forget(id: string): Promise<void>;
}
