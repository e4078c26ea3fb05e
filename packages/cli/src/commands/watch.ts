import * as path from 'node:path';
import type { FileChangeEvent, FileDeleteEvent, WatcherPort } from '@uplang/core';
import { ConversionPipeline } from '@uplang/core';
import { UpParser } from '@uplang/parser';
import type { CliContext } from '../context.js';
import { formatConversionError } from '../format-conversion-error.js';
import { createGenerator } from '../generators.js';
import { UsageError } from '../errors.js';
import { createLogger } from '../logger.js';
import { MemoryConversionState } from '../memory-conversion-state.js';
import type { CliSettings } from '../settings.js';

const log = createLogger('Watch');

function baseName(fileName: string): string {
  return fileName.replace(/\.[^/.]+$/, '');
}

/**
 * Keeps `outDir` in sync with the `.up` files in `dir`: changed sources are
 * converted, removed sources take their output with them.
 */
export class WatchSession {
  private readonly pipeline: ConversionPipeline;
  private readonly conversionState = new MemoryConversionState();
  private readonly outputExtension: string;
  private readonly watcher: WatcherPort;

  constructor(
    dir: string,
    private readonly outDir: string,
    settings: CliSettings,
    private readonly context: CliContext,
  ) {
    const parser = new UpParser({ maxDepth: settings.maxDepth });
    const generator = createGenerator(settings);
    if (path.resolve(dir) === path.resolve(outDir) && parser.extensions.includes(generator.extension)) {
      throw new UsageError(
        `watch output directory must differ from ${dir} when writing ${generator.extension} files`,
      );
    }
    this.outputExtension = generator.extension;
    this.pipeline = new ConversionPipeline(parser, generator, this.conversionState);

    this.watcher = context.createWatcher(dir, { extensions: parser.extensions });
    this.watcher.onFileChange((event) => this.handleChange(event));
    this.watcher.onFileDelete((event) => this.handleDelete(event));
    this.watcher.onError((error) => log.error('Watcher error', error));
  }

  start(): Promise<void> {
    return this.watcher.start();
  }

  stop(): Promise<void> {
    return this.watcher.stop();
  }

  async handleChange(event: FileChangeEvent): Promise<void> {
    try {
      const output = await this.pipeline.handleFileChange(event);
      if (!output) return;

      const outputPath = path.join(this.outDir, `${baseName(event.name)}${output.extension}`);
      await this.context.fileSystem.writeFile(outputPath, output.content);
      log.info(`Converted: ${event.name} -> ${outputPath}`);
    } catch (error) {
      log.warn(formatConversionError(event.id, error));
    }
  }

  async handleDelete(event: FileDeleteEvent): Promise<void> {
    await this.conversionState.forget(event.id);
    const outputPath = path.join(this.outDir, `${baseName(event.name)}${this.outputExtension}`);
    await this.context.fileSystem.removeFile(outputPath);
    log.info(`Removed: ${outputPath}`);
  }
}

export async function runWatch(
  dir: string,
  out: string,
  settings: CliSettings,
  context: CliContext,
): Promise<number> {
  const session = new WatchSession(
    path.resolve(context.cwd, dir),
    path.resolve(context.cwd, out),
    settings,
    context,
  );
  await session.start();
  log.info(`Watching ${dir} -> ${out}`);

  await context.untilInterrupted();
  await session.stop();
  return 0;
}
