import type { UpNode } from './node.js';
import type { ListValue, TableValue, UpValue, ValueKind, ValueOfKind } from './value.js';
import { isKind } from './value.js';

/**
 * An ordered, immutable sequence of UP nodes.
 *
 * Lookups scan the nodes in source order and return the first node whose key
 * matches. Typed lookups (`getScalar`, `getBlock`, ...) skip nodes whose value
 * is a different variant and return `undefined` rather than throwing.
 * Duplicate keys are kept; there is no keyed index.
 */
export class UpDocument implements Iterable<UpNode> {
  readonly nodes: readonly UpNode[];

  constructor(nodes: readonly UpNode[] = []) {
    this.nodes = Object.freeze([...nodes]);
    Object.freeze(this);
  }

  get size(): number {
    return this.nodes.length;
  }

  isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  keys(): string[] {
    return this.nodes.map((n) => n.key);
  }

  getNode(key: string): UpNode | undefined {
    return this.nodes.find((n) => n.key === key);
  }

  get(key: string): UpValue | undefined {
    return this.getNode(key)?.value;
  }

  getAll(key: string): UpValue[] {
    return this.nodes.filter((n) => n.key === key).map((n) => n.value);
  }

  getScalar(key: string): string | undefined {
    return this.find(key, 'scalar')?.text;
  }

  getMultiline(key: string): string | undefined {
    return this.find(key, 'multiline')?.text;
  }

  /** First scalar or multiline string under `key`. */
  getText(key: string): string | undefined {
    for (const n of this.nodes) {
      if (n.key !== key) continue;
      if (n.value.kind === 'scalar' || n.value.kind === 'multiline') return n.value.text;
    }
    return undefined;
  }

  getBlock(key: string): UpDocument | undefined {
    const value = this.find(key, 'block');
    return value ? new UpDocument(value.nodes) : undefined;
  }

  getList(key: string): ListValue['items'] | undefined {
    return this.find(key, 'list')?.items;
  }

  getTable(key: string): TableValue | undefined {
    return this.find(key, 'table');
  }

  [Symbol.iterator](): Iterator<UpNode> {
    return this.nodes[Symbol.iterator]();
  }

  private find<K extends ValueKind>(key: string, kind: K): ValueOfKind<K> | undefined {
    for (const { key: nodeKey, value } of this.nodes) {
      if (nodeKey === key && isKind(value, kind)) {
        return value;
      }
    }
    return undefined;
  }
}
