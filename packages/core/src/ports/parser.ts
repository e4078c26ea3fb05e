import type { UpDocument } from '../models/index.js';

export interface ParserPort {
  /** Unique identifier for this parser */
  readonly id: string;

  /** Supported file extensions */
  readonly extensions: string[];

  /** Parse decoded source text into a document */
  parse(text: string): UpDocument;
}
