export type { ConversionStatePort } from './conversion-state.js';
export type { FileGeneratorPort, GeneratorOutput } from './file-generator.js';
export type { ParserPort } from './parser.js';
export type { FileChangeEvent, FileDeleteEvent, WatcherPort } from './watcher.js';
