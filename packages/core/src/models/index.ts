export type {
  BlockValue,
  ListValue,
  MultilineValue,
  ScalarValue,
  TableRow,
  TableValue,
  UpValue,
  ValueKind,
  ValueOfKind,
} from './value.js';
export { assertNever, block, isKind, list, multiline, scalar, table } from './value.js';
export type { UpNode } from './node.js';
export { node } from './node.js';
export { UpDocument } from './document.js';
export { documentsEqual, nodesEqual, valuesEqual } from './equality.js';
