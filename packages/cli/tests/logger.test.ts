import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  let debugSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('info calls console.debug with [uplang:Namespace] prefix', () => {
    createLogger('Watch').info('Watching src -> out');
    expect(debugSpy).toHaveBeenCalledWith('[uplang:Watch] Watching src -> out');
  });

  it('warn calls console.warn with the prefix', () => {
    createLogger('Config').warn('indent ignored');
    expect(warnSpy).toHaveBeenCalledWith('[uplang:Config] indent ignored');
  });

  it('error calls console.error with the prefix', () => {
    createLogger('Cli').error('Unexpected failure');
    expect(errorSpy).toHaveBeenCalledWith('[uplang:Cli] Unexpected failure');
  });

  it('error passes the error object as the second argument', () => {
    const err = new Error('fail');
    createLogger('Convert').error('Conversion failed: app.up', err);
    expect(errorSpy).toHaveBeenCalledWith('[uplang:Convert] Conversion failed: app.up', err);
  });
});
