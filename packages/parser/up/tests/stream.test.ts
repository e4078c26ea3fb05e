import { Readable } from 'node:stream';
import { documentsEqual, EncodingError, UpSyntaxError } from '@uplang/core';
import { describe, expect, it } from 'vitest';
import { parse } from '../src/parser.js';
import { parseStream } from '../src/stream.js';

async function* chunks(...parts: (string | Uint8Array)[]): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) {
    yield part;
  }
}

describe('parseStream', () => {
  const text = ['name Ada', 'server {', '  port!int 80', '}', 'tags [x, y]'].join('\n');

  it('matches parse on the same text', async () => {
    const doc = await parseStream(chunks(text.slice(0, 12), text.slice(12)));

    expect(documentsEqual(doc, parse(text))).toBe(true);
  });

  it('reads a Node readable stream of buffers', async () => {
    const doc = await parseStream(Readable.from([Buffer.from(text, 'utf-8')]));

    expect(doc.getBlock('server')?.getScalar('port')).toBe('80');
  });

  it('decodes multi-byte characters split across chunks', async () => {
    const bytes = new TextEncoder().encode('city 서울');
    const doc = await parseStream(chunks(bytes.slice(0, 6), bytes.slice(6)));

    expect(doc.getScalar('city')).toBe('서울');
  });

  it('raises EncodingError on invalid UTF-8', async () => {
    const invalid = new Uint8Array([0x61, 0x20, 0xff, 0xfe]);

    await expect(parseStream(chunks(invalid))).rejects.toBeInstanceOf(EncodingError);
  });

  it('passes options through', async () => {
    await expect(parseStream(chunks('a {\n  b {\n  }\n}'), { maxDepth: 1 })).rejects.toBeInstanceOf(
      UpSyntaxError,
    );
  });
});
