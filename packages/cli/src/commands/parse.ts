import type { CliContext } from '../context.js';
import { formatConversionError } from '../format-conversion-error.js';
import type { CliSettings } from '../settings.js';
import { printTree } from '../tree-printer.js';
import { readDocument } from './read-document.js';

export async function runParse(file: string, settings: CliSettings, context: CliContext): Promise<number> {
  try {
    const document = await readDocument(context, file, settings.maxDepth);
    context.stdout(printTree(document));
    return 0;
  } catch (error) {
    context.stderr(`${formatConversionError(file, error)}\n`);
    return 1;
  }
}
