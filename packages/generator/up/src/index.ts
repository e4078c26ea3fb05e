export { UpGenerator, formatDocument } from './up-generator.js';
export type { UpFormatOptions } from './up-generator.js';
