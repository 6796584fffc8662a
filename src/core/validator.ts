import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import { FileMetadataRecord, ValidationResult } from '../types';
import { RECORD_SCHEMA_FILE } from '../config/schema-paths';
import { createAjv, formatSchemaErrors, loadSchema } from './schemas';
import { isValidLatitude, isValidLongitude, toHullOrder } from './geometry';

/**
 * Validation gate for records before they are handed to the index.
 *
 * Structure is checked against the record schema first. The consistency
 * rules the schema cannot express (axis order of bbox vs hull, time order)
 * only run on structurally valid records.
 */
export class RecordValidator {
  private validateSchema: ValidateFunction<FileMetadataRecord>;

  constructor(ajv: Ajv = createAjv()) {
    this.validateSchema = ajv.compile<FileMetadataRecord>(loadSchema(RECORD_SCHEMA_FILE));
  }

  public validate(value: unknown): ValidationResult {
    if (!this.validateSchema(value)) {
      return { valid: false, errors: formatSchemaErrors(this.validateSchema.errors) };
    }

    const errors = checkRecordConsistency(value);
    return { valid: errors.length === 0, errors };
  }
}

/**
 * Cross-field rules for a structurally valid record
 */
export function checkRecordConsistency(record: FileMetadataRecord): string[] {
  const errors: string[] = [];

  const temporal = record.temporal;
  if (temporal?.start_time !== undefined && temporal.end_time !== undefined) {
    if (temporal.start_time > temporal.end_time) {
      errors.push(
        `/temporal: start_time ${temporal.start_time} is after end_time ${temporal.end_time}`
      );
    }
  }

  const geometries = record.spatial?.geometries;
  if (geometries) {
    const [minLon, minLat, maxLon, maxLat] = geometries.bbox;

    if (minLon > maxLon || minLat > maxLat) {
      errors.push('/spatial/geometries/bbox: minimum exceeds maximum, expected [lon, lat, lon2, lat2]');
    }
    if (![minLon, maxLon].every(isValidLongitude) || ![minLat, maxLat].every(isValidLatitude)) {
      errors.push('/spatial/geometries/bbox: coordinates out of range');
    }

    const expected = toHullOrder(geometries.bbox);
    if (!expected.every((v, i) => v === geometries.hull[i])) {
      errors.push(
        `/spatial/geometries/hull: expected [${expected.join(', ')}] ([lat, lon, lat2, lon2] of bbox), got [${geometries.hull.join(', ')}]`
      );
    }

    const outside = geometries.coordinates.filter(
      ([lon, lat]) => lon < minLon || lon > maxLon || lat < minLat || lat > maxLat
    );
    if (outside.length > 0) {
      errors.push(`/spatial/geometries/coordinates: ${outside.length} position(s) outside bbox`);
    }
  }

  return errors;
}
