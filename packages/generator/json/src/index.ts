export { JsonGenerator, toJson, toJsonValue, DEFAULT_JSON_OPTIONS } from './json-generator.js';
export type { DuplicateKeyMode, JsonObject, JsonOptions, JsonValue } from './json-generator.js';
export { coerceScalar, COERCIBLE_ANNOTATIONS } from './coerce.js';
export type { JsonScalar } from './coerce.js';
