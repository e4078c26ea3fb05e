import { UpSyntaxError } from '@uplang/core';
import { INLINE_LIST_SEPARATOR, LIST_CLOSE, LIST_OPEN } from './constants.js';

export function isInlineList(trimmed: string): boolean {
  return trimmed.length >= 2 && trimmed.startsWith(LIST_OPEN) && trimmed.endsWith(LIST_CLOSE);
}

/** Splits `[a, b, c]` into its trimmed items. */
export function parseInlineList(trimmed: string, lineNumber: number): string[] {
  const content = trimmed.slice(LIST_OPEN.length, -LIST_CLOSE.length).trim();
  if (content.length === 0) return [];

  const items = content.split(INLINE_LIST_SEPARATOR).map((item) => item.trim());
  if (items.some((item) => item.length === 0)) {
    throw new UpSyntaxError(lineNumber, 'empty item in inline list');
  }
  return items;
}
