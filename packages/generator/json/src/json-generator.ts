import type {
  FileGeneratorPort,
  GeneratorOutput,
  UpDocument,
  UpNode,
  UpValue,
} from '@uplang/core';
import { assertNever } from '@uplang/core';
import type { JsonScalar } from './coerce.js';
import { coerceScalar } from './coerce.js';

export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * How repeated keys in one block map onto a JSON object:
 * `collect` gathers every value into an array, `first` and `last` keep one.
 */
export type DuplicateKeyMode = 'collect' | 'first' | 'last';

export interface JsonOptions {
  coerce?: boolean;
  duplicateKeys?: DuplicateKeyMode;
  indent?: number;
}

export const DEFAULT_JSON_OPTIONS: Required<JsonOptions> = {
  coerce: true,
  duplicateKeys: 'collect',
  indent: 2,
};

class JsonConverter {
  constructor(private readonly options: Required<JsonOptions>) {}

  nodes(nodes: readonly UpNode[]): JsonObject {
    const grouped = new Map<string, JsonValue[]>();
    for (const n of nodes) {
      const converted = this.node(n);
      const existing = grouped.get(n.key);
      if (existing) {
        existing.push(converted);
      } else {
        grouped.set(n.key, [converted]);
      }
    }

    // fromEntries defines own properties, so a key like "__proto__" stays data.
    return Object.fromEntries(
      [...grouped].map(([key, values]) => [key, this.pick(values)] as const),
    );
  }

  value(value: UpValue): JsonValue {
    switch (value.kind) {
      case 'scalar':
      case 'multiline':
        return value.text;
      case 'block':
        return this.nodes(value.nodes);
      case 'list':
        return value.items.map((item) => this.value(item));
      case 'table':
        return value.rows.map((row) => Object.fromEntries(row));
      default:
        return assertNever(value);
    }
  }

  private node(n: UpNode): JsonValue {
    if (n.value.kind === 'scalar' && this.options.coerce) {
      return coerceScalar(n.key, n.typeAnnotation, n.value.text);
    }
    return this.value(n.value);
  }

  private pick(values: JsonValue[]): JsonValue {
    switch (this.options.duplicateKeys) {
      case 'first':
        return values[0];
      case 'last':
        return values[values.length - 1];
      case 'collect':
        return values.length === 1 ? values[0] : values;
      default:
        return assertNever(this.options.duplicateKeys);
    }
  }
}

export function toJsonValue(document: UpDocument, options: JsonOptions = {}): JsonObject {
  return new JsonConverter({ ...DEFAULT_JSON_OPTIONS, ...options }).nodes(document.nodes);
}

export function toJson(document: UpDocument, options: JsonOptions = {}): string {
  const indent = options.indent ?? DEFAULT_JSON_OPTIONS.indent;
  return `${JSON.stringify(toJsonValue(document, options), null, indent)}\n`;
}

export class JsonGenerator implements FileGeneratorPort {
  readonly id = 'json';
  readonly displayName = 'JSON';
  readonly extension = '.json';

  constructor(private readonly options: JsonOptions = {}) {}

  generate(document: UpDocument, _outputName: string): GeneratorOutput {
    return { content: toJson(document, this.options), extension: this.extension };
  }
}
