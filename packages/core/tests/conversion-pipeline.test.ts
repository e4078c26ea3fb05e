import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConversionPipeline } from '../src/conversion-pipeline.js';
import { ConversionError, UpSyntaxError } from '../src/exceptions.js';
import { UpDocument } from '../src/models/document.js';
import { node } from '../src/models/node.js';
import { scalar } from '../src/models/value.js';
import type { ConversionStatePort } from '../src/ports/conversion-state.js';
import type { FileGeneratorPort } from '../src/ports/file-generator.js';
import type { ParserPort } from '../src/ports/parser.js';
import type { FileChangeEvent } from '../src/ports/watcher.js';

const mockDocument = new UpDocument([node('name', scalar('test'))]);

function createMockParser(): ParserPort {
  return {
    id: 'up',
    extensions: ['.up'],
    parse: vi.fn().mockReturnValue(mockDocument),
  };
}

function createMockGenerator(): FileGeneratorPort {
  return {
    id: 'json',
    displayName: 'JSON',
    extension: '.json',
    generate: vi.fn().mockReturnValue({ content: '{"name":"test"}\n', extension: '.json' }),
  };
}

function createMockState(lastMtime?: number): ConversionStatePort {
  return {
    getLastConvertedMtime: vi.fn().mockResolvedValue(lastMtime),
    setLastConvertedMtime: vi.fn().mockResolvedValue(undefined),
    forget: vi.fn().mockResolvedValue(undefined),
  };
}

function toArrayBuffer(text: string): ArrayBuffer {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

function createEvent(overrides?: Partial<FileChangeEvent>): FileChangeEvent {
  return {
    id: '/path/to/file.up',
    name: 'file.up',
    extension: '.up',
    mtime: 1700000000000,
    readData: vi.fn().mockResolvedValue(toArrayBuffer('name test')),
    ...overrides,
  };
}

describe('ConversionPipeline', () => {
  let parser: ParserPort;
  let generator: FileGeneratorPort;
  let conversionState: ConversionStatePort;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    parser = createMockParser();
    generator = createMockGenerator();
    conversionState = createMockState();
  });

  it('converts a file with a supported extension', async () => {
    const pipeline = new ConversionPipeline(parser, generator, conversionState);
    const event = createEvent();

    const result = await pipeline.handleFileChange(event);

    expect(result).toEqual({ content: '{"name":"test"}\n', extension: '.json' });
    expect(parser.parse).toHaveBeenCalledWith('name test');
    expect(generator.generate).toHaveBeenCalledWith(mockDocument, 'file');
    expect(conversionState.setLastConvertedMtime).toHaveBeenCalledWith(
      '/path/to/file.up',
      1700000000000,
    );
  });

  it('returns null and logs for an unsupported extension', async () => {
    const pipeline = new ConversionPipeline(parser, generator, conversionState);
    const event = createEvent({ extension: '.txt', name: 'file.txt' });

    const result = await pipeline.handleFileChange(event);

    expect(result).toBeNull();
    expect(event.readData).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('[uplang:Convert] Skipped (unsupported): file.txt');
  });

  it('matches extensions case-insensitively', () => {
    const pipeline = new ConversionPipeline(parser, generator, conversionState);

    expect(pipeline.supportsExtension('.UP')).toBe(true);
  });

  it('skips a file that is not newer than its last conversion', async () => {
    conversionState = createMockState(1700000000000);
    const pipeline = new ConversionPipeline(parser, generator, conversionState);
    const event = createEvent({ mtime: 1700000000000 });

    const result = await pipeline.handleFileChange(event);

    expect(result).toBeNull();
    expect(event.readData).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('[uplang:Convert] Skipped (up-to-date): file.up');
  });

  it('converts a file newer than its last conversion', async () => {
    conversionState = createMockState(1699999999999);
    const pipeline = new ConversionPipeline(parser, generator, conversionState);
    const event = createEvent({ mtime: 1700000000000 });

    const result = await pipeline.handleFileChange(event);

    expect(result).not.toBeNull();
    expect(event.readData).toHaveBeenCalled();
  });

  it('wraps decoding failures with the decode phase', () => {
    const pipeline = new ConversionPipeline(parser, generator, conversionState);

    let caught: unknown;
    try {
      pipeline.convert(new Uint8Array([0xff]), 'bad');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConversionError);
    expect(caught).toMatchObject({ phase: 'decode' });
  });

  it('wraps parser failures with the parse phase', async () => {
    vi.mocked(parser.parse).mockImplementation(() => {
      throw new UpSyntaxError(2, 'unterminated block');
    });
    const pipeline = new ConversionPipeline(parser, generator, conversionState);

    await expect(pipeline.handleFileChange(createEvent())).rejects.toMatchObject({
      name: 'ConversionError',
      phase: 'parse',
      message: 'Conversion failed at parse: line 2: unterminated block',
    });
    expect(conversionState.setLastConvertedMtime).not.toHaveBeenCalled();
  });

  it('wraps generator failures with the generate phase', () => {
    vi.mocked(generator.generate).mockImplementation(() => {
      throw new Error('boom');
    });
    const pipeline = new ConversionPipeline(parser, generator, conversionState);

    expect(() => pipeline.convertText('a 1', 'out')).toThrow('Conversion failed at generate: boom');
  });
});
