import type { MultilineValue } from '@uplang/core';
import { multiline, UpSyntaxError } from '@uplang/core';
import { MULTILINE_FENCE } from './constants.js';
import type { LineReader } from './line-reader.js';

const LEADING_WHITESPACE = /^[ \t]*/;

function leadingWhitespace(line: string): string {
  return LEADING_WHITESPACE.exec(line)?.[0] ?? '';
}

function commonPrefix(a: string, b: string): string {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return a.slice(0, i);
}

/**
 * Removes the leading whitespace shared by every non-blank line.
 * Tabs and spaces are compared literally, never expanded.
 */
export function stripCommonIndent(lines: readonly string[]): string[] {
  let prefix: string | null = null;
  for (const line of lines) {
    if (line.trim().length === 0) continue;
    const indent = leadingWhitespace(line);
    prefix = prefix === null ? indent : commonPrefix(prefix, indent);
    if (prefix.length === 0) break;
  }

  if (!prefix) return [...lines];

  const shared = prefix;
  return lines.map((line) => {
    if (line.startsWith(shared)) return line.slice(shared.length);
    return line.trim().length === 0 ? '' : line;
  });
}

/**
 * Reads a fenced multiline string. The reader must be positioned on the
 * opening fence; it is left on the line after the closing fence.
 */
export function readMultiline(reader: LineReader): MultilineValue {
  const openedAt = reader.lineNumber;
  const content: string[] = [];
  reader.advance();

  while (!reader.atEnd) {
    const line = reader.current();
    if (line.trim() === MULTILINE_FENCE) {
      reader.advance();
      return multiline(stripCommonIndent(content).join('\n'));
    }
    content.push(line);
    reader.advance();
  }

  throw new UpSyntaxError(openedAt, 'unterminated multiline string');
}
