import * as fs from 'fs';
import * as yaml from 'yaml';
import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import { RawFileMetadata } from '../types';
import { RAW_SCHEMA_FILE } from '../config/schema-paths';
import { createAjv, formatSchemaErrors, loadSchema } from './schemas';

/**
 * Reads raw metadata documents (YAML or JSON) produced by format readers
 */
export class RawMetadataReader {
  private validateInput: ValidateFunction<RawFileMetadata>;

  constructor(ajv: Ajv = createAjv()) {
    this.validateInput = ajv.compile<RawFileMetadata>(loadSchema(RAW_SCHEMA_FILE));
  }

  /**
   * Parse and validate raw metadata text. `source` names the input in errors.
   */
  public parse(content: string, source: string): RawFileMetadata {
    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (e) {
      throw new Error(`${source}: not valid YAML or JSON: ${e instanceof Error ? e.message : e}`);
    }

    if (!this.validateInput(parsed)) {
      const details = formatSchemaErrors(this.validateInput.errors).join('; ');
      throw new Error(`${source}: invalid file metadata: ${details}`);
    }

    return parsed;
  }

  /**
   * Read a metadata file. A missing `size` is taken from the described file on disk.
   */
  public read(filePath: string): RawFileMetadata {
    const raw = this.parse(fs.readFileSync(filePath, 'utf-8'), filePath);

    if (raw.size === undefined && fs.existsSync(raw.path)) {
      return { ...raw, size: fs.statSync(raw.path).size };
    }
    return raw;
  }
}
