export const COMMENT = '#';
export const ANNOTATION_SEPARATOR = '!';

export const BLOCK_OPEN = '{';
export const BLOCK_CLOSE = '}';
export const EMPTY_BLOCK = '{}';

export const LIST_OPEN = '[';
export const LIST_CLOSE = ']';
export const EMPTY_LIST = '[]';
export const INLINE_LIST_SEPARATOR = ',';

export const TABLE_OPEN = '{|';
export const TABLE_CLOSE = '|}';
export const TABLE_FIELD_SEPARATOR = '|';

export const MULTILINE_FENCE = '```';

export const OPENERS = [BLOCK_OPEN, LIST_OPEN, TABLE_OPEN] as const;
export type Opener = (typeof OPENERS)[number];

export const CLOSERS = [TABLE_CLOSE, BLOCK_CLOSE, LIST_CLOSE] as const;
export type Closer = (typeof CLOSERS)[number];

/** Key and annotation tokens: anything but whitespace and structural sigils. */
export const TOKEN_PATTERN = /^[^\s{}[\]!|]+/;

export const LINE_BREAK = /\r?\n/;

export const DEFAULT_MAX_DEPTH = 64;
