import * as path from 'node:path';
import { ConversionPipeline } from '@uplang/core';
import { UpParser } from '@uplang/parser';
import type { CliContext } from '../context.js';
import { formatConversionError } from '../format-conversion-error.js';
import { createGenerator } from '../generators.js';
import { createLogger } from '../logger.js';
import { MemoryConversionState } from '../memory-conversion-state.js';
import type { CliSettings } from '../settings.js';

const log = createLogger('Convert');

function createPipeline(settings: CliSettings): ConversionPipeline {
  return new ConversionPipeline(
    new UpParser({ maxDepth: settings.maxDepth }),
    createGenerator(settings),
    new MemoryConversionState(),
  );
}

export async function runConvert(
  file: string,
  out: string | undefined,
  settings: CliSettings,
  context: CliContext,
): Promise<number> {
  const pipeline = createPipeline(settings);
  try {
    const data = await context.fileSystem.readFile(path.resolve(context.cwd, file));
    const baseName = path.basename(file).replace(/\.[^/.]+$/, '');
    const output = pipeline.convert(data, baseName);

    if (out === undefined) {
      context.stdout(output.content);
    } else {
      await context.fileSystem.writeFile(path.resolve(context.cwd, out), output.content);
      log.info(`Converted: ${file} -> ${out}`);
    }
    return 0;
  } catch (error) {
    context.stderr(`${formatConversionError(file, error)}\n`);
    return 1;
  }
}
