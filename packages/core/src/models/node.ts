import type { UpValue } from './value.js';

export interface UpNode {
  readonly key: string;
  readonly typeAnnotation?: string;
  readonly value: UpValue;
}

export function node(key: string, value: UpValue, typeAnnotation?: string): UpNode {
  if (key.length === 0) {
    throw new Error('Node key must not be empty');
  }
  if (typeAnnotation === undefined) {
    return Object.freeze({ key, value });
  }
  if (typeAnnotation.length === 0 || typeAnnotation.includes('!')) {
    throw new Error(`Invalid type annotation for ${key}: ${JSON.stringify(typeAnnotation)}`);
  }
  return Object.freeze({ key, typeAnnotation, value });
}
