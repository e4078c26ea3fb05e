import { CoercionError } from '@uplang/core';

export type JsonScalar = string | number | boolean | null;

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type Coercer = (key: string, annotation: string, text: string) => JsonScalar;

function toInteger(key: string, annotation: string, text: string): number {
  const value = Number(text);
  if (!INTEGER.test(text) || !Number.isSafeInteger(value)) {
    throw new CoercionError(key, annotation, text);
  }
  return value;
}

function toFloat(key: string, annotation: string, text: string): number {
  if (!FLOAT.test(text)) {
    throw new CoercionError(key, annotation, text);
  }
  return Number(text);
}

function toBoolean(key: string, annotation: string, text: string): boolean {
  if (text === 'true') return true;
  if (text === 'false') return false;
  throw new CoercionError(key, annotation, text);
}

function toNull(key: string, annotation: string, text: string): null {
  if (text === '' || text === 'null') return null;
  throw new CoercionError(key, annotation, text);
}

const COERCERS: ReadonlyMap<string, Coercer> = new Map<string, Coercer>([
  ['int', toInteger],
  ['integer', toInteger],
  ['float', toFloat],
  ['number', toFloat],
  ['double', toFloat],
  ['bool', toBoolean],
  ['boolean', toBoolean],
  ['null', toNull],
]);

export const COERCIBLE_ANNOTATIONS: readonly string[] = [...COERCERS.keys()];

/**
 * Converts annotated scalar text to its native JSON value. Annotations
 * without a coercer leave the text as a string.
 */
export function coerceScalar(key: string, annotation: string | undefined, text: string): JsonScalar {
  if (annotation === undefined) return text;
  const coercer = COERCERS.get(annotation);
  return coercer ? coercer(key, annotation, text.trim()) : text;
}
