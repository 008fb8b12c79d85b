export type { DecodeErrorTag } from './errors.js';
export {
  DecodeError,
  UriError,
  JsonParseError,
  SchemaValidationError,
  EmitError,
  ConfigurationError,
  errorMessage,
} from './errors.js';
export type { Schema, ValidationResult } from './schema-registry.js';
export { SchemaRegistry, coerceVersion } from './schema-registry.js';
export { parseJson, stringifyJson, widenBigInts } from './json-document.js';
export type { GeoField, GeoDatabase, GeoDatabaseOpener } from './geo-enricher.js';
export { GeoEnricher } from './geo-enricher.js';
export type { PartitionCount, DedupeFilterOptions, DedupeResult, PartitionSnapshot } from './dedupe-filter.js';
export { DedupeFilter, VALID_PARTITIONS, partitionFor } from './dedupe-filter.js';
export type { NormalizeResult } from './normalizer.js';
export { DocumentNormalizer, sampleIdFor } from './normalizer.js';
export type { MessageSink, DecoderOptions, DecoderDeps, DecodeOutcome } from './decoder.js';
export { TelemetryDecoder, RECORD_TYPE, DUPLICATE_TYPE, ERROR_TYPE } from './decoder.js';
