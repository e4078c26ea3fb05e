import { decodeUtf8 } from './decode.js';
import { ConversionError } from './exceptions.js';
import type { UpDocument } from './models/index.js';
import type { ConversionStatePort } from './ports/conversion-state.js';
import type { FileGeneratorPort, GeneratorOutput } from './ports/file-generator.js';
import type { ParserPort } from './ports/parser.js';
import type { FileChangeEvent } from './ports/watcher.js';

export class ConversionPipeline {
  constructor(
    private readonly parser: ParserPort,
    private readonly generator: FileGeneratorPort,
    private readonly conversionState: ConversionStatePort,
  ) {}

  supportsExtension(ext: string): boolean {
    return this.parser.extensions.some((supported) => supported.toLowerCase() === ext.toLowerCase());
  }

  async handleFileChange(event: FileChangeEvent): Promise<GeneratorOutput | null> {
    if (!this.supportsExtension(event.extension)) {
      console.log(`[uplang:Convert] Skipped (unsupported): ${event.name}`);
      return null;
    }

    const lastMtime = await this.conversionState.getLastConvertedMtime(event.id);
    if (lastMtime !== undefined && event.mtime <= lastMtime) {
      console.log(`[uplang:Convert] Skipped (up-to-date): ${event.name}`);
      return null;
    }

    const data = await event.readData();
    const baseName = event.name.replace(/\.[^/.]+$/, '');
    const output = this.convert(data, baseName);
    await this.conversionState.setLastConvertedMtime(event.id, event.mtime);
    return output;
  }

  convert(data: ArrayBuffer | Uint8Array, outputName: string): GeneratorOutput {
    let text: string;
    try {
      text = decodeUtf8(data);
    } catch (error) {
      throw new ConversionError('decode', error);
    }

    return this.convertText(text, outputName);
  }

  convertText(text: string, outputName: string): GeneratorOutput {
    let document: UpDocument;
    try {
      document = this.parser.parse(text);
    } catch (error) {
      throw new ConversionError('parse', error);
    }

    try {
      return this.generator.generate(document, outputName);
    } catch (error) {
      throw new ConversionError('generate', error);
    }
  }
}
