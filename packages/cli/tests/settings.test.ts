import { parse } from '@uplang/parser';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors.js';
import {
  DEFAULT_SETTINGS,
  loadConfigFile,
  resolveSettings,
  settingsFromDocument,
} from '../src/settings.js';
import { MemoryFileSystem } from './helpers/fake-context.js';

describe('DEFAULT_SETTINGS', () => {
  it('converts to coerced JSON with a depth limit of 64', () => {
    expect(DEFAULT_SETTINGS).toEqual({
      format: 'json',
      coerce: true,
      duplicates: 'collect',
      maxDepth: 64,
      indent: 2,
    });
  });
});

describe('settingsFromDocument', () => {
  it('reads every known setting', () => {
    const doc = parse('format up\ncoerce!bool false\nduplicates first\nmaxDepth!int 10\nindent 0');

    expect(settingsFromDocument(doc)).toEqual({
      format: 'up',
      coerce: false,
      duplicates: 'first',
      maxDepth: 10,
      indent: 0,
    });
  });

  it('returns no overrides for an empty document', () => {
    expect(settingsFromDocument(parse('# nothing here'))).toEqual({});
  });

  it.each([
    ['colour blue', "Unknown setting 'colour'"],
    ['format {\n}', 'format must be a single value, got a block'],
    ['coerce yes', "coerce must be true or false, got 'yes'"],
    ['indent 9', "indent must be an integer from 0 to 8, got '9'"],
    ['maxDepth -1', "maxDepth must be an integer from 1 to 10000, got '-1'"],
    ['duplicates merge', "duplicates must be one of collect, first, last, got 'merge'"],
  ])('rejects %j', (text, message) => {
    expect(() => settingsFromDocument(parse(text))).toThrow(new ConfigError('x', message));
  });
});

describe('loadConfigFile', () => {
  it('returns no overrides when the file is absent', async () => {
    await expect(loadConfigFile(new MemoryFileSystem(), '/work')).resolves.toEqual({});
  });

  it('reads uplang.config.up from the directory', async () => {
    const fileSystem = new MemoryFileSystem({ '/work/uplang.config.up': 'indent 4\n' });

    await expect(loadConfigFile(fileSystem, '/work')).resolves.toEqual({ indent: 4 });
  });

  it('names the config file in errors', async () => {
    const fileSystem = new MemoryFileSystem({ '/work/uplang.config.up': 'coerce maybe\n' });

    await expect(loadConfigFile(fileSystem, '/work')).rejects.toMatchObject({
      name: 'ConfigError',
      setting: 'coerce',
      message: "uplang.config.up: coerce must be true or false, got 'maybe'",
    });
  });
});

describe('resolveSettings', () => {
  it('layers overrides over the defaults in order', () => {
    expect(resolveSettings({ format: 'up', indent: 4 }, { indent: 1 })).toEqual({
      ...DEFAULT_SETTINGS,
      format: 'up',
      indent: 1,
    });
  });

  it('does not mutate the defaults', () => {
    resolveSettings({ coerce: false });

    expect(DEFAULT_SETTINGS.coerce).toBe(true);
  });
});
