import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import type { ErrorObject } from 'ajv';
import { SCHEMA_DIR } from '../config/schema-paths';

/**
 * The subset of JSON Schema the shipped documents use.
 * Declared as a type alias so it stays assignable to Ajv's schema type.
 */
export type JsonSchema = {
  $schema?: string;
  $id?: string;
  title?: string;
  description?: string;
  type?: string | string[];
  format?: string;
  enum?: string[];
  const?: string;
  required?: string[];
  properties?: Record<string, JsonSchema>;
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  minItems?: number;
  maxItems?: number;
  minLength?: number;
  minimum?: number;
};

/**
 * Load a schema document from the schema directory
 */
export function loadSchema(fileName: string, dir: string = SCHEMA_DIR): JsonSchema {
  const content = fs.readFileSync(path.join(dir, fileName), 'utf-8');
  const schema: JsonSchema = JSON.parse(content);
  return schema;
}

/**
 * Ajv instance used for every validation gate: all errors, date-time formats,
 * and union types for attribute values.
 */
export function createAjv(): Ajv {
  const ajv = new Ajv({
    allErrors: true,
    allowUnionTypes: true,
  });
  addFormats(ajv);
  return ajv;
}

/**
 * Render Ajv errors as `<path>: <message>` lines
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) return [];
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'is invalid'}`);
}
