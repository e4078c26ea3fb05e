export class ParseError extends Error {
  readonly line: number;
  readonly reason: string;

  constructor(line: number, reason: string) {
    super(`line ${line}: ${reason}`);
    this.name = 'ParseError';
    this.line = line;
    this.reason = reason;
  }
}

/** Structural violation in UP source text. */
export class UpSyntaxError extends ParseError {
  constructor(line: number, reason: string) {
    super(line, reason);
    this.name = 'SyntaxError';
  }
}

export class DepthExceededError extends UpSyntaxError {
  readonly maxDepth: number;

  constructor(line: number, maxDepth: number) {
    super(line, `nesting depth exceeds limit of ${maxDepth}`);
    this.name = 'DepthExceededError';
    this.maxDepth = maxDepth;
  }
}

export class EncodingError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'EncodingError';
    this.cause = cause;
  }
}

export class SerializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SerializationError';
  }
}

export class CoercionError extends Error {
  readonly key: string;
  readonly typeAnnotation: string;

  constructor(key: string, typeAnnotation: string, text: string) {
    super(`Cannot coerce ${key}!${typeAnnotation}: ${JSON.stringify(text)}`);
    this.name = 'CoercionError';
    this.key = key;
    this.typeAnnotation = typeAnnotation;
  }
}

export type ConversionPhase = 'decode' | 'parse' | 'generate';

export class ConversionError extends Error {
  readonly phase: ConversionPhase;

  constructor(phase: ConversionPhase, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Conversion failed at ${phase}: ${message}`);
    this.name = 'ConversionError';
    this.phase = phase;
    this.cause = cause;
  }
}

export type FileSystemOperation = 'read' | 'write' | 'mkdir' | 'delete' | 'stat';

export class FileSystemError extends Error {
  readonly operation: FileSystemOperation;
  readonly path: string;

  constructor(operation: FileSystemOperation, filePath: string, cause?: unknown) {
    super(`File system ${operation} failed: ${filePath}`);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.cause = cause;
  }
}
