import type { UpDocument } from '@uplang/core';
import { EncodingError } from '@uplang/core';
import { TextDecoder } from 'node:util';
import type { ParserOptions } from './parser.js';
import { UpParser } from './parser.js';

export type StreamSource = AsyncIterable<string | Uint8Array>;

function decodeChunk(decoder: TextDecoder, chunk?: Uint8Array): string {
  try {
    return chunk === undefined ? decoder.decode() : decoder.decode(chunk, { stream: true });
  } catch (error) {
    throw new EncodingError('Input is not valid UTF-8 text', error);
  }
}

/**
 * Reads the whole source, then parses it exactly as `parse` would.
 * Byte chunks are decoded as UTF-8; a multi-byte sequence may span chunks.
 */
export async function parseStream(
  source: StreamSource,
  options?: ParserOptions,
): Promise<UpDocument> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  const parts: string[] = [];

  for await (const chunk of source) {
    parts.push(typeof chunk === 'string' ? chunk : decodeChunk(decoder, chunk));
  }
  parts.push(decodeChunk(decoder));

  return new UpParser(options).parse(parts.join(''));
}
