import { describe, expect, it } from 'vitest';
import {
  ConversionError,
  DepthExceededError,
  ParseError,
  UpSyntaxError,
} from '../src/exceptions.js';

describe('exceptions', () => {
  it('prefixes parse errors with the line number', () => {
    const error = new UpSyntaxError(4, 'unterminated block');

    expect(error).toBeInstanceOf(ParseError);
    expect(error.name).toBe('SyntaxError');
    expect(error.message).toBe('line 4: unterminated block');
    expect(error.reason).toBe('unterminated block');
  });

  it('classifies depth errors as syntax errors', () => {
    const error = new DepthExceededError(9, 8);

    expect(error).toBeInstanceOf(UpSyntaxError);
    expect(error.maxDepth).toBe(8);
    expect(error.message).toBe('line 9: nesting depth exceeds limit of 8');
  });

  it('wraps the cause of a conversion failure', () => {
    const cause = new UpSyntaxError(1, 'bad');
    const error = new ConversionError('parse', cause);

    expect(error.phase).toBe('parse');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Conversion failed at parse: line 1: bad');
  });
});
