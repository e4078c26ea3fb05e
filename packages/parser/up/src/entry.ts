import { UpSyntaxError } from '@uplang/core';
import { ANNOTATION_SEPARATOR, TOKEN_PATTERN } from './constants.js';

export interface Entry {
  readonly key: string;
  readonly typeAnnotation?: string;
  /** Text after the separator, trailing whitespace removed. */
  readonly remainder: string;
}

/**
 * Splits an entry line into `key[!type]` and the remainder. The key is
 * separated from the remainder by exactly one whitespace character; any
 * further leading whitespace belongs to the remainder.
 */
export function splitEntry(line: string, lineNumber: number): Entry {
  const text = line.trimStart();
  const keyMatch = TOKEN_PATTERN.exec(text);
  if (!keyMatch) {
    if (text.startsWith(ANNOTATION_SEPARATOR)) {
      throw new UpSyntaxError(lineNumber, 'missing key before type annotation');
    }
    throw new UpSyntaxError(lineNumber, `expected a key, found '${text[0]}'`);
  }

  const key = keyMatch[0];
  let pos = key.length;
  let typeAnnotation: string | undefined;

  if (text[pos] === ANNOTATION_SEPARATOR) {
    const annotationMatch = TOKEN_PATTERN.exec(text.slice(pos + 1));
    if (!annotationMatch) {
      throw new UpSyntaxError(lineNumber, `missing type after '${key}${ANNOTATION_SEPARATOR}'`);
    }
    typeAnnotation = annotationMatch[0];
    pos += 1 + typeAnnotation.length;
    if (text[pos] === ANNOTATION_SEPARATOR) {
      throw new UpSyntaxError(lineNumber, `nested type annotation on '${key}'`);
    }
  }

  if (pos === text.length) {
    return { key, typeAnnotation, remainder: '' };
  }

  if (!/\s/.test(text[pos])) {
    throw new UpSyntaxError(
      lineNumber,
      `expected whitespace after '${text.slice(0, pos)}', found '${text[pos]}'`,
    );
  }

  return { key, typeAnnotation, remainder: text.slice(pos + 1).trimEnd() };
}
