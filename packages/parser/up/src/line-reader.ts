import { COMMENT, LINE_BREAK } from './constants.js';

export function isSkippable(trimmed: string): boolean {
  return trimmed.length === 0 || trimmed.startsWith(COMMENT);
}

export class LineReader {
  private readonly lines: readonly string[];
  private pos = 0;

  constructor(text: string) {
    this.lines = text.split(LINE_BREAK);
  }

  /** 1-based number of the current line. */
  get lineNumber(): number {
    return this.pos + 1;
  }

  get atEnd(): boolean {
    return this.pos >= this.lines.length;
  }

  current(): string {
    return this.lines[this.pos] ?? '';
  }

  peek(offset = 1): string | undefined {
    return this.lines[this.pos + offset];
  }

  advance(): void {
    this.pos += 1;
  }

  skipIgnorable(): void {
    while (!this.atEnd && isSkippable(this.current().trim())) {
      this.pos += 1;
    }
  }
}
