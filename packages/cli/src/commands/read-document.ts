import * as path from 'node:path';
import type { UpDocument } from '@uplang/core';
import { decodeUtf8 } from '@uplang/core';
import { parse, parseStream } from '@uplang/parser';
import type { CliContext } from '../context.js';

export const STDIN_PATH = '-';

export async function readDocument(
  context: CliContext,
  file: string,
  maxDepth: number,
): Promise<UpDocument> {
  if (file === STDIN_PATH) {
    return parseStream(context.stdin(), { maxDepth });
  }
  const data = await context.fileSystem.readFile(path.resolve(context.cwd, file));
  return parse(decodeUtf8(data), { maxDepth });
}
