export { UpParser, parse } from './parser.js';
export type { ParserOptions } from './parser.js';
export { parseStream } from './stream.js';
export type { StreamSource } from './stream.js';
export { stripCommonIndent } from './multiline.js';

export { UpSyntaxError, DepthExceededError, EncodingError, ParseError } from '@uplang/core';
