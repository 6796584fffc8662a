import * as path from 'path';

/**
 * Directory holding the JSON Schema documents shipped with the package.
 * Resolves to the same place from `src/config` and from `dist/config`.
 */
export const SCHEMA_DIR = path.resolve(__dirname, '../../schema');

/**
 * EXTERNAL CONTRACT: the record schema is read by the document index tooling.
 * Renaming it breaks consumers that load it by file name.
 */
export const RECORD_SCHEMA_FILE = 'file-metadata.schema.json';

/**
 * Shape of the metadata a format reader hands over before records are built.
 */
export const RAW_SCHEMA_FILE = 'raw-file-metadata.schema.json';
