import type { FileGeneratorPort } from '@uplang/core';
import { assertNever } from '@uplang/core';
import { JsonGenerator } from '@uplang/generator-json';
import { UpGenerator } from '@uplang/generator-up';
import type { CliSettings } from './settings.js';

export function createGenerator(settings: CliSettings): FileGeneratorPort {
  switch (settings.format) {
    case 'json':
      return new JsonGenerator({
        coerce: settings.coerce,
        duplicateKeys: settings.duplicates,
        indent: settings.indent,
      });
    case 'up':
      return new UpGenerator({ indent: settings.indent });
    default:
      return assertNever(settings.format);
  }
}
