import type { UpDocument } from '../models/index.js';

export interface GeneratorOutput {
  readonly content: string;
  readonly extension: string;
}

export interface FileGeneratorPort {
  readonly id: string;
  readonly displayName: string;
  readonly extension: string;
  generate(document: UpDocument, outputName: string): GeneratorOutput;
}
