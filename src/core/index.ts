export { MetadataIndexer, createIndexer } from './indexer';
export { RecordBuilder, buildRecord, DEFAULT_BUILD_CONFIG } from './record-builder';
export { RecordValidator, checkRecordConsistency } from './validator';
export { RawMetadataReader } from './reader';
export { buildIndexMapping } from './mapping';
export { documentId, toBulkBody } from './bulk';
export {
  boundingBox,
  toHullOrder,
  toBboxOrder,
  pairCoordinates,
  summarise,
  outline,
} from './geometry';
export { flattenParameters, parameterItems } from './parameters';
export { loadSchema, createAjv } from './schemas';
export type { JsonSchema } from './schemas';
export { ConsoleLogger, defaultLogger } from './logger';
export type { Logger } from './logger';
export * from '../types';
export { loadConfig, getDefaultConfig, validateConfig } from '../config';
