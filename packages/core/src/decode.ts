import { EncodingError } from './exceptions.js';

/**
 * Decodes UTF-8 bytes, rejecting malformed sequences instead of
 * substituting U+FFFD. A leading byte-order mark is dropped.
 */
export function decodeUtf8(data: ArrayBuffer | Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch (error) {
    throw new EncodingError('Input is not valid UTF-8 text', error);
  }
}
