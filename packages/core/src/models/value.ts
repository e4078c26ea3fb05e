import type { UpNode } from './node.js';

export interface ScalarValue {
  readonly kind: 'scalar';
  readonly text: string;
}

export interface BlockValue {
  readonly kind: 'block';
  readonly nodes: readonly UpNode[];
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly UpValue[];
}

export type TableRow = ReadonlyMap<string, string>;

/** Read-only column-to-field view of one table row; exposes no mutators. */
class FrozenRow implements TableRow {
  private readonly fields: Map<string, string>;

  constructor(entries: readonly (readonly [string, string])[]) {
    this.fields = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.size;
  }

  get(column: string): string | undefined {
    return this.fields.get(column);
  }

  has(column: string): boolean {
    return this.fields.has(column);
  }

  forEach(
    callback: (field: string, column: string, row: TableRow) => void,
    thisArg?: unknown,
  ): void {
    for (const [column, field] of this.fields) {
      callback.call(thisArg, field, column, this);
    }
  }

  entries() {
    return this.fields.entries();
  }

  keys() {
    return this.fields.keys();
  }

  values() {
    return this.fields.values();
  }

  [Symbol.iterator]() {
    return this.fields.entries();
  }
}

export interface TableValue {
  readonly kind: 'table';
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

export interface MultilineValue {
  readonly kind: 'multiline';
  readonly text: string;
}

export type UpValue = ScalarValue | BlockValue | ListValue | TableValue | MultilineValue;

export type ValueKind = UpValue['kind'];

export type ValueOfKind<K extends ValueKind> = Extract<UpValue, { kind: K }>;

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

export function isKind<K extends ValueKind>(value: UpValue, kind: K): value is ValueOfKind<K> {
  return value.kind === kind;
}

export function scalar(text: string): ScalarValue {
  return Object.freeze({ kind: 'scalar', text });
}

export function multiline(text: string): MultilineValue {
  return Object.freeze({ kind: 'multiline', text });
}

export function block(nodes: readonly UpNode[]): BlockValue {
  return Object.freeze({ kind: 'block', nodes: Object.freeze([...nodes]) });
}

export function list(items: readonly UpValue[]): ListValue {
  return Object.freeze({ kind: 'list', items: Object.freeze([...items]) });
}

/**
 * Builds a table from its declared columns and row fields.
 * Each row must supply exactly one field per column, in column order.
 */
export function table(
  columns: readonly string[],
  rows: readonly (readonly string[])[],
): TableValue {
  const seen = new Set<string>();
  for (const column of columns) {
    if (column.length === 0) {
      throw new Error('Table column name must not be empty');
    }
    if (seen.has(column)) {
      throw new Error(`Duplicate table column: ${column}`);
    }
    seen.add(column);
  }

  const tableRows: TableRow[] = rows.map((fields, index) => {
    if (fields.length !== columns.length) {
      throw new Error(
        `Table row ${index + 1} has ${fields.length} fields, expected ${columns.length}`,
      );
    }
    return new FrozenRow(columns.map((column, i) => [column, fields[i]] as const));
  });

  return Object.freeze({
    kind: 'table',
    columns: Object.freeze([...columns]),
    rows: Object.freeze(tableRows),
  });
}
