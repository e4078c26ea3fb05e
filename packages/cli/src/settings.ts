import * as path from 'node:path';
import type { UpDocument } from '@uplang/core';
import { decodeUtf8 } from '@uplang/core';
import type { DuplicateKeyMode } from '@uplang/generator-json';
import { parse } from '@uplang/parser';
import { ConfigError } from './errors.js';
import type { FileSystem } from './file-system.js';
import { formatConversionError } from './format-conversion-error.js';

export const CONFIG_FILE_NAME = 'uplang.config.up';

export type OutputFormat = 'json' | 'up';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'up'];

export const DUPLICATE_KEY_MODES: readonly DuplicateKeyMode[] = ['collect', 'first', 'last'];

export interface CliSettings {
  format: OutputFormat;
  coerce: boolean;
  duplicates: DuplicateKeyMode;
  maxDepth: number;
  indent: number;
}

export const DEFAULT_SETTINGS: CliSettings = {
  format: 'json',
  coerce: true,
  duplicates: 'collect',
  maxDepth: 64,
  indent: 2,
};

const MAX_INDENT = 8;

function parseChoice<T extends string>(setting: string, text: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === text);
  if (match === undefined) {
    throw new ConfigError(setting, `${setting} must be one of ${choices.join(', ')}, got '${text}'`);
  }
  return match;
}

function parseBoolean(setting: string, text: string): boolean {
  if (text === 'true') return true;
  if (text === 'false') return false;
  throw new ConfigError(setting, `${setting} must be true or false, got '${text}'`);
}

function parseInteger(setting: string, text: string, min: number, max: number): number {
  const value = Number(text);
  if (!/^\d+$/.test(text) || value < min || value > max) {
    throw new ConfigError(setting, `${setting} must be an integer from ${min} to ${max}, got '${text}'`);
  }
  return value;
}

export function parseFormat(text: string): OutputFormat {
  return parseChoice('format', text, OUTPUT_FORMATS);
}

export function parseDuplicates(text: string): DuplicateKeyMode {
  return parseChoice('duplicates', text, DUPLICATE_KEY_MODES);
}

export function parseMaxDepth(text: string): number {
  return parseInteger('maxDepth', text, 1, 10_000);
}

export function parseIndent(text: string): number {
  return parseInteger('indent', text, 0, MAX_INDENT);
}

/**
 * Reads settings from a parsed config document. Every entry must be a
 * scalar naming a known setting; type annotations are accepted and ignored.
 */
export function settingsFromDocument(document: UpDocument): Partial<CliSettings> {
  const settings: Partial<CliSettings> = {};
  for (const { key, value } of document) {
    if (value.kind !== 'scalar') {
      throw new ConfigError(key, `${key} must be a single value, got a ${value.kind}`);
    }
    const text = value.text.trim();
    switch (key) {
      case 'format':
        settings.format = parseFormat(text);
        break;
      case 'coerce':
        settings.coerce = parseBoolean(key, text);
        break;
      case 'duplicates':
        settings.duplicates = parseDuplicates(text);
        break;
      case 'maxDepth':
        settings.maxDepth = parseMaxDepth(text);
        break;
      case 'indent':
        settings.indent = parseIndent(text);
        break;
      default:
        throw new ConfigError(key, `Unknown setting '${key}'`);
    }
  }
  return settings;
}

/** Loads `uplang.config.up` from `dir`; a missing file yields no overrides. */
export async function loadConfigFile(fileSystem: FileSystem, dir: string): Promise<Partial<CliSettings>> {
  const data = await fileSystem.readOptionalFile(path.join(dir, CONFIG_FILE_NAME));
  if (data === undefined) return {};

  let document: UpDocument;
  try {
    document = parse(decodeUtf8(data));
  } catch (error) {
    throw new ConfigError('file', formatConversionError(CONFIG_FILE_NAME, error));
  }

  try {
    return settingsFromDocument(document);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(error.setting, `${CONFIG_FILE_NAME}: ${error.message}`);
    }
    throw error;
  }
}

/** Later layers win. Layers must omit unset keys rather than hold `undefined`. */
export function resolveSettings(...layers: Partial<CliSettings>[]): CliSettings {
  return layers.reduce<CliSettings>((settings, layer) => ({ ...settings, ...layer }), {
    ...DEFAULT_SETTINGS,
  });
}
