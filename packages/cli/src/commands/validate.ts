import type { CliContext } from '../context.js';
import { formatConversionError } from '../format-conversion-error.js';
import type { CliSettings } from '../settings.js';
import { readDocument } from './read-document.js';

/** Checks every file, reporting each one; fails if any file fails. */
export async function runValidate(
  files: readonly string[],
  settings: CliSettings,
  context: CliContext,
): Promise<number> {
  let failed = 0;
  for (const file of files) {
    try {
      await readDocument(context, file, settings.maxDepth);
      context.stdout(`ok ${file}\n`);
    } catch (error) {
      failed++;
      context.stderr(`${formatConversionError(file, error)}\n`);
    }
  }
  return failed === 0 ? 0 : 1;
}
