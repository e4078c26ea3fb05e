export * from './models/index.js';

export type {
  ConversionStatePort,
  FileChangeEvent,
  FileDeleteEvent,
  FileGeneratorPort,
  GeneratorOutput,
  ParserPort,
  WatcherPort,
} from './ports/index.js';

export {
  ParseError,
  UpSyntaxError,
  DepthExceededError,
  EncodingError,
  SerializationError,
  CoercionError,
  ConversionError,
  FileSystemError,
} from './exceptions.js';
export type { ConversionPhase, FileSystemOperation } from './exceptions.js';

export { decodeUtf8 } from './decode.js';

export { ConversionPipeline } from './conversion-pipeline.js';
