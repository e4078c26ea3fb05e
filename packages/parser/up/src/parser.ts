import type { ParserPort, UpNode, UpValue } from '@uplang/core';
import {
  block,
  DepthExceededError,
  list,
  node,
  scalar,
  UpDocument,
  UpSyntaxError,
} from '@uplang/core';
import type { Closer, Opener } from './constants.js';
import {
  BLOCK_CLOSE,
  BLOCK_OPEN,
  CLOSERS,
  DEFAULT_MAX_DEPTH,
  EMPTY_BLOCK,
  LIST_CLOSE,
  MULTILINE_FENCE,
  OPENERS,
  TABLE_OPEN,
} from './constants.js';
import { splitEntry } from './entry.js';
import { isInlineList, parseInlineList } from './inline-list.js';
import { isSkippable, LineReader } from './line-reader.js';
import { readMultiline } from './multiline.js';
import { readTable } from './table.js';

export interface ParserOptions {
  /** Maximum number of blocks and lists open at once. Defaults to 64. */
  maxDepth?: number;
}

type Attach = (value: UpValue) => void;

interface DocumentFrame {
  readonly kind: 'document';
  readonly nodes: UpNode[];
}

interface BlockFrame {
  readonly kind: 'block';
  readonly nodes: UpNode[];
  readonly openedAt: number;
  readonly attach: Attach;
}

interface ListFrame {
  readonly kind: 'list';
  readonly items: UpValue[];
  readonly openedAt: number;
  readonly attach: Attach;
}

type Frame = DocumentFrame | BlockFrame | ListFrame;

function isOpener(trimmed: string): trimmed is Opener {
  return OPENERS.some((opener) => opener === trimmed);
}

function findCloser(trimmed: string): Closer | undefined {
  return CLOSERS.find((closer) => trimmed.startsWith(closer));
}

/**
 * Single-pass UP parser. Open blocks and lists live on an explicit frame
 * stack, so nesting depth is bounded by `maxDepth` rather than by the call
 * stack. Tables and multiline strings cannot nest and are read in place.
 */
export class UpParser implements ParserPort {
  readonly id = 'up';
  readonly extensions = ['.up'];

  private readonly maxDepth: number;

  constructor(options: ParserOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    this.maxDepth = maxDepth;
  }

  parse(text: string): UpDocument {
    const reader = new LineReader(text);
    const root: DocumentFrame = { kind: 'document', nodes: [] };
    const stack: Frame[] = [root];

    while (!reader.atEnd) {
      const trimmed = reader.current().trim();
      if (isSkippable(trimmed)) {
        reader.advance();
        continue;
      }

      const closer = findCloser(trimmed);
      const frame = stack[stack.length - 1];
      if (closer) {
        this.close(stack, frame, closer, trimmed, reader);
      } else if (frame.kind === 'list') {
        this.readValue(stack, reader, trimmed, (value) => frame.items.push(value));
      } else {
        this.readEntry(stack, frame, reader);
      }
    }

    const unclosed = stack[stack.length - 1];
    if (unclosed.kind !== 'document') {
      throw new UpSyntaxError(unclosed.openedAt, `unterminated ${unclosed.kind}`);
    }

    return new UpDocument(root.nodes);
  }

  private readEntry(stack: Frame[], frame: DocumentFrame | BlockFrame, reader: LineReader): void {
    const entry = splitEntry(reader.current(), reader.lineNumber);
    const attach: Attach = (value) => {
      frame.nodes.push(node(entry.key, value, entry.typeAnnotation));
    };

    if (entry.remainder.length === 0) {
      const next = reader.peek()?.trim();
      if (next !== undefined && isOpener(next)) {
        reader.advance();
        this.open(stack, reader, next, attach);
        return;
      }
      attach(scalar(''));
      reader.advance();
      return;
    }

    this.readValue(stack, reader, entry.remainder, attach);
  }

  /**
   * Dispatches on the value text of an entry or list item. Plain text
   * becomes a scalar verbatim, so callers decide how much to trim.
   */
  private readValue(stack: Frame[], reader: LineReader, text: string, attach: Attach): void {
    const shape = text.trim();

    if (shape.startsWith(MULTILINE_FENCE)) {
      if (shape !== MULTILINE_FENCE) {
        throw new UpSyntaxError(
          reader.lineNumber,
          `unexpected content after multiline opener '${MULTILINE_FENCE}'`,
        );
      }
      attach(readMultiline(reader));
      return;
    }

    if (isOpener(shape)) {
      this.open(stack, reader, shape, attach);
      return;
    }

    if (shape === EMPTY_BLOCK) {
      attach(block([]));
    } else if (isInlineList(shape)) {
      attach(list(parseInlineList(shape, reader.lineNumber).map(scalar)));
    } else {
      attach(scalar(text));
    }
    reader.advance();
  }

  private open(stack: Frame[], reader: LineReader, opener: Opener, attach: Attach): void {
    if (opener === TABLE_OPEN) {
      attach(readTable(reader));
      return;
    }

    // stack[0] is the document itself, so its length is the depth after opening.
    if (stack.length > this.maxDepth) {
      throw new DepthExceededError(reader.lineNumber, this.maxDepth);
    }

    const openedAt = reader.lineNumber;
    stack.push(
      opener === BLOCK_OPEN
        ? { kind: 'block', nodes: [], openedAt, attach }
        : { kind: 'list', items: [], openedAt, attach },
    );
    reader.advance();
  }

  private close(
    stack: Frame[],
    frame: Frame,
    closer: Closer,
    trimmed: string,
    reader: LineReader,
  ): void {
    const lineNumber = reader.lineNumber;
    if (trimmed !== closer) {
      throw new UpSyntaxError(lineNumber, `unexpected content after '${closer}'`);
    }
    if (frame.kind === 'document') {
      throw new UpSyntaxError(lineNumber, `unexpected '${closer}' with nothing open`);
    }

    const expected = frame.kind === 'block' ? BLOCK_CLOSE : LIST_CLOSE;
    if (closer !== expected) {
      throw new UpSyntaxError(
        lineNumber,
        `expected '${expected}' to close ${frame.kind} opened on line ${frame.openedAt}, found '${closer}'`,
      );
    }

    stack.pop();
    frame.attach(frame.kind === 'block' ? block(frame.nodes) : list(frame.items));
    reader.advance();
  }
}

export function parse(text: string, options?: ParserOptions): UpDocument {
  return new UpParser(options).parse(text);
}
