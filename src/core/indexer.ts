import * as fs from 'fs';
import {
  BuildOutcome,
  FileMetadataRecord,
  FilemetaConfig,
  IndexMapping,
  ValidationResult,
} from '../types';
import { loadConfig } from '../config';
import { RECORD_SCHEMA_FILE } from '../config/schema-paths';
import { Logger, defaultLogger } from './logger';
import { RawMetadataReader } from './reader';
import { RecordBuilder } from './record-builder';
import { RecordValidator } from './validator';
import { buildIndexMapping } from './mapping';
import { toBulkBody } from './bulk';
import { JsonSchema, loadSchema } from './schemas';

/**
 * Turns raw metadata files into validated index records and index payloads
 */
export class MetadataIndexer {
  private config: FilemetaConfig;
  private logger: Logger;
  private reader: RawMetadataReader;
  private builder: RecordBuilder;
  private validator: RecordValidator;

  constructor(config?: FilemetaConfig, logger: Logger = defaultLogger) {
    this.config = config || loadConfig(undefined, logger);
    this.logger = logger;
    this.reader = new RawMetadataReader();
    this.builder = new RecordBuilder(this.config.build, logger);
    this.validator = new RecordValidator();
  }

  public getConfig(): FilemetaConfig {
    return this.config;
  }

  /**
   * Read, build and validate one input. Input problems end up in `errors`.
   */
  public buildFromFile(filePath: string): BuildOutcome {
    let record: FileMetadataRecord;
    try {
      record = this.builder.build(this.reader.read(filePath));
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.error(message);
      return { source: filePath, errors: [message] };
    }

    const result = this.validator.validate(record);
    if (!result.valid) {
      result.errors.forEach((err) => this.logger.error(`${filePath}: ${err}`));
      return { source: filePath, record, errors: result.errors };
    }

    return { source: filePath, record, errors: [] };
  }

  public buildAll(filePaths: string[]): BuildOutcome[] {
    return filePaths.map((p) => this.buildFromFile(p));
  }

  /**
   * Validate an already built record stored as JSON
   */
  public validateFile(filePath: string): ValidationResult {
    let value: unknown;
    try {
      value = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
      return { valid: false, errors: [`cannot read record: ${e instanceof Error ? e.message : e}`] };
    }
    return this.validator.validate(value);
  }

  public validate(value: unknown): ValidationResult {
    return this.validator.validate(value);
  }

  /**
   * Bulk body for the configured index, or for `indexName` when given
   */
  public bulk(records: FileMetadataRecord[], indexName?: string): string {
    return toBulkBody(records, indexName ?? this.config.index.name);
  }

  public schema(): JsonSchema {
    return loadSchema(RECORD_SCHEMA_FILE);
  }

  public mapping(): IndexMapping {
    return buildIndexMapping(this.schema());
  }
}

/**
 * Create a MetadataIndexer instance
 */
export function createIndexer(config?: FilemetaConfig, logger?: Logger): MetadataIndexer {
  return new MetadataIndexer(config, logger);
}
