import { ConversionError, FileSystemError, ParseError } from '@uplang/core';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** One-line diagnostic for a failed file, `<file>:<line>: <reason>` for syntax errors. */
export function formatConversionError(fileName: string, error: unknown): string {
  if (error instanceof ParseError) {
    return `${fileName}:${error.line}: ${error.reason}`;
  }
  if (error instanceof ConversionError) {
    switch (error.phase) {
      case 'decode': return `${fileName}: Decode failed: ${describe(error.cause)}`;
      case 'parse': return error.cause instanceof ParseError
        ? formatConversionError(fileName, error.cause)
        : `${fileName}: Parse failed: ${describe(error.cause)}`;
      case 'generate': return `${fileName}: Generate failed: ${describe(error.cause)}`;
    }
  }
  if (error instanceof FileSystemError) {
    return `${fileName}: Cannot ${error.operation} ${error.path}`;
  }
  return `${fileName}: ${describe(error)}`;
}
