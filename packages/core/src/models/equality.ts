import type { UpDocument } from './document.js';
import type { UpNode } from './node.js';
import type { TableRow, UpValue } from './value.js';
import { assertNever } from './value.js';

export function valuesEqual(a: UpValue, b: UpValue): boolean {
  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && b.text === a.text;
    case 'multiline':
      return b.kind === 'multiline' && b.text === a.text;
    case 'block':
      return b.kind === 'block' && nodeListsEqual(a.nodes, b.nodes);
    case 'list':
      return (
        b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case 'table':
      return (
        b.kind === 'table' &&
        arraysEqual(a.columns, b.columns) &&
        a.rows.length === b.rows.length &&
        a.rows.every((row, i) => rowsEqual(row, b.rows[i]))
      );
    default:
      return assertNever(a);
  }
}

export function nodesEqual(a: UpNode, b: UpNode): boolean {
  return (
    a.key === b.key && a.typeAnnotation === b.typeAnnotation && valuesEqual(a.value, b.value)
  );
}

export function documentsEqual(a: UpDocument, b: UpDocument): boolean {
  return nodeListsEqual(a.nodes, b.nodes);
}

function nodeListsEqual(a: readonly UpNode[], b: readonly UpNode[]): boolean {
  return a.length === b.length && a.every((n, i) => nodesEqual(n, b[i]));
}

function arraysEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((s, i) => s === b[i]);
}

function rowsEqual(a: TableRow, b: TableRow): boolean {
  if (a.size !== b.size) return false;
  const left = [...a.entries()];
  const right = [...b.entries()];
  return left.every(([column, field], i) => right[i][0] === column && right[i][1] === field);
}
