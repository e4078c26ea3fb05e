import type { UpNode, UpValue } from '@uplang/core';
import { assertNever } from '@uplang/core';

const INDENT = '  ';

function summarize(value: UpValue): string {
  switch (value.kind) {
    case 'scalar':
    case 'multiline':
      return `${value.kind} ${JSON.stringify(value.text)}`;
    case 'block':
      return `block (${value.nodes.length})`;
    case 'list':
      return `list (${value.items.length})`;
    case 'table':
      return `table [${value.columns.join(', ')}] (${value.rows.length})`;
    default:
      return assertNever(value);
  }
}

function label(n: UpNode): string {
  return n.typeAnnotation === undefined ? n.key : `${n.key}!${n.typeAnnotation}`;
}

function appendValue(lines: string[], head: string, value: UpValue, depth: number): void {
  const pad = INDENT.repeat(depth);
  lines.push(`${pad}${head}: ${summarize(value)}`);

  switch (value.kind) {
    case 'block':
      for (const child of value.nodes) appendValue(lines, label(child), child.value, depth + 1);
      break;
    case 'list':
      value.items.forEach((item, i) => appendValue(lines, `[${i}]`, item, depth + 1));
      break;
    case 'table':
      value.rows.forEach((row, i) => {
        const fields = value.columns.map((column) => `${column}=${JSON.stringify(row.get(column))}`);
        lines.push(`${pad}${INDENT}[${i}]: row ${fields.join(' ')}`);
      });
      break;
    default:
      break;
  }
}

/**
 * Renders a document as an indented outline, one line per node, list item
 * and table row: `key!type: kind "text"`.
 */
export function printTree(nodes: Iterable<UpNode>): string {
  const lines: string[] = [];
  for (const n of nodes) appendValue(lines, label(n), n.value, 0);
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}
