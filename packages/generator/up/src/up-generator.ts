import type {
  FileGeneratorPort,
  GeneratorOutput,
  TableValue,
  UpDocument,
  UpNode,
  UpValue,
} from '@uplang/core';
import { assertNever, SerializationError } from '@uplang/core';

export interface UpFormatOptions {
  /** Spaces per nesting level. Defaults to 2. */
  indent?: number;
}

const TOKEN = /^[^\s{}[\]!|]+$/;
const OPENERS = new Set(['{', '[', '{|', '{}']);
const CLOSER_PREFIXES = ['}', ']', '|}'];
const FENCE = '```';
const INLINE_SEPARATOR = ',';

function isInlineList(text: string): boolean {
  return text.length >= 2 && text.startsWith('[') && text.endsWith(']');
}

/** Text that the parser would read as something other than a plain scalar. */
function looksStructural(shape: string): boolean {
  return OPENERS.has(shape) || shape.startsWith(FENCE) || isInlineList(shape);
}

function checkKey(n: UpNode): string {
  if (!TOKEN.test(n.key) || n.key.startsWith('#')) {
    throw new SerializationError(`Key cannot be written as UP: ${JSON.stringify(n.key)}`);
  }
  if (n.typeAnnotation === undefined) return n.key;
  if (!TOKEN.test(n.typeAnnotation)) {
    throw new SerializationError(
      `Type annotation cannot be written as UP: ${n.key}!${n.typeAnnotation}`,
    );
  }
  return `${n.key}!${n.typeAnnotation}`;
}

function checkEntryScalar(head: string, text: string): void {
  const shape = text.trim();
  const representable =
    !text.includes('\n') &&
    text === text.trimEnd() &&
    !looksStructural(shape);
  if (!representable) {
    throw new SerializationError(`Scalar cannot be written as UP: ${head} ${JSON.stringify(text)}`);
  }
}

/** Whether the text survives as a list item on a line of its own. */
function isLineItem(text: string): boolean {
  return (
    text.length > 0 &&
    !text.includes('\n') &&
    text === text.trim() &&
    !text.startsWith('#') &&
    !CLOSER_PREFIXES.some((closer) => text.startsWith(closer)) &&
    !looksStructural(text)
  );
}

function checkItemScalar(text: string): void {
  if (!isLineItem(text)) {
    throw new SerializationError(`List item cannot be written as UP: ${JSON.stringify(text)}`);
  }
}

/**
 * Item texts for the `[a, b]` form, or undefined when some item is not a
 * scalar or would not split back out of the comma-separated line.
 */
function inlineItems(items: readonly UpValue[]): string[] | undefined {
  const texts: string[] = [];
  for (const item of items) {
    if (
      item.kind !== 'scalar' ||
      item.text.length === 0 ||
      item.text !== item.text.trim() ||
      item.text.includes(INLINE_SEPARATOR) ||
      item.text.includes('\n')
    ) {
      return undefined;
    }
    texts.push(item.text);
  }
  return texts;
}

function formatRow(fields: readonly string[]): string {
  if (fields.some((field) => field.includes('|'))) {
    throw new SerializationError(`Table field cannot contain '|': ${fields.join(', ')}`);
  }
  if (fields[0].startsWith('#')) {
    throw new SerializationError(`Table row cannot start with '#': ${fields.join(' ')}`);
  }
  const needsPipes = fields.some((field) => field.length === 0 || /\s/.test(field));
  if (!needsPipes) {
    return fields.join(' ');
  }
  if (fields.length < 2) {
    throw new SerializationError(
      `Single-column table field cannot be empty or contain whitespace: ${JSON.stringify(fields[0])}`,
    );
  }
  return fields.join(' | ');
}

class UpWriter {
  private readonly lines: string[] = [];

  constructor(private readonly indentWidth: number) {}

  toString(): string {
    return this.lines.length === 0 ? '' : `${this.lines.join('\n')}\n`;
  }

  writeNodes(nodes: readonly UpNode[], depth: number): void {
    for (const n of nodes) {
      this.writeValue(checkKey(n), n.value, depth);
    }
  }

  /** `head` is the key text, or empty for a list item. */
  private writeValue(head: string, value: UpValue, depth: number): void {
    const pad = this.pad(depth);
    const lead = (sigil: string): string => `${pad}${head ? `${head} ` : ''}${sigil}`;

    switch (value.kind) {
      case 'scalar':
        if (head) {
          checkEntryScalar(head, value.text);
          this.lines.push(value.text ? `${pad}${head} ${value.text}` : `${pad}${head}`);
        } else {
          checkItemScalar(value.text);
          this.lines.push(`${pad}${value.text}`);
        }
        return;
      case 'multiline':
        this.lines.push(lead(FENCE));
        this.writeMultiline(value.text, depth + 1);
        this.lines.push(`${pad}${FENCE}`);
        return;
      case 'block':
        if (value.nodes.length === 0) {
          this.lines.push(lead('{}'));
          return;
        }
        this.lines.push(lead('{'));
        this.writeNodes(value.nodes, depth + 1);
        this.lines.push(`${pad}}`);
        return;
      case 'list':
        if (value.items.length === 0) {
          this.lines.push(lead('[]'));
          return;
        }
        if (value.items.some((item) => item.kind === 'scalar' && !isLineItem(item.text))) {
          const texts = inlineItems(value.items);
          if (texts) {
            this.lines.push(lead(`[${texts.join(`${INLINE_SEPARATOR} `)}]`));
            return;
          }
        }
        this.lines.push(lead('['));
        for (const item of value.items) {
          this.writeValue('', item, depth + 1);
        }
        this.lines.push(`${pad}]`);
        return;
      case 'table':
        this.lines.push(lead('{|'));
        this.writeTable(value, depth + 1);
        this.lines.push(`${pad}|}`);
        return;
      default:
        assertNever(value);
    }
  }

  private writeTable(value: TableValue, depth: number): void {
    if (value.columns.length === 0) {
      throw new SerializationError('Table must declare at least one column');
    }
    const pad = this.pad(depth);
    this.lines.push(`${pad}${formatRow(value.columns)}`);
    for (const row of value.rows) {
      this.lines.push(`${pad}${formatRow(value.columns.map((column) => row.get(column) ?? ''))}`);
    }
  }

  private writeMultiline(text: string, depth: number): void {
    const lines = text.split('\n');
    if (lines.some((line) => line.trim() === FENCE)) {
      throw new SerializationError('Multiline text cannot contain a line with only ```');
    }

    const contentLines = lines.filter((line) => line.trim().length > 0);
    if (contentLines.length === 0) {
      // Nothing for the parser to measure indentation against.
      this.lines.push(...lines);
      return;
    }
    const first = contentLines[0][0];
    if ((first === ' ' || first === '\t') && contentLines.every((line) => line[0] === first)) {
      throw new SerializationError('Multiline text cannot share leading whitespace on every line');
    }

    const pad = this.pad(depth);
    for (const line of lines) {
      this.lines.push(line.length === 0 ? '' : `${pad}${line}`);
    }
  }

  private pad(depth: number): string {
    return ' '.repeat(this.indentWidth * depth);
  }
}

/**
 * Writes a document as UP text that parses back to a structurally equal
 * document. Values with no faithful UP spelling raise `SerializationError`.
 */
export function formatDocument(document: UpDocument, options: UpFormatOptions = {}): string {
  const writer = new UpWriter(options.indent ?? 2);
  writer.writeNodes(document.nodes, 0);
  return writer.toString();
}

export class UpGenerator implements FileGeneratorPort {
  readonly id = 'up';
  readonly displayName = 'UP';
  readonly extension = '.up';

  constructor(private readonly options: UpFormatOptions = {}) {}

  generate(document: UpDocument, _outputName: string): GeneratorOutput {
    return { content: formatDocument(document, this.options), extension: this.extension };
  }
}
