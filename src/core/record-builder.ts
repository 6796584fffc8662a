import * as path from 'path';
import {
  BuildConfig,
  FileMetadataRecord,
  FileSection,
  Geometries,
  RawFileMetadata,
  SpatialSection,
  TemporalSection,
} from '../types';
import {
  SUMMARY_POINTS,
  boundingBox,
  inferGeometryType,
  outline,
  pairCoordinates,
  summarise,
  toHullOrder,
} from './geometry';
import { flattenParameters } from './parameters';
import { Logger, defaultLogger } from './logger';

export const DEFAULT_BUILD_CONFIG: BuildConfig = {
  summary: false,
  summaryPoints: SUMMARY_POINTS,
  outline: false,
  defaultStatus: 'ingested',
};

/**
 * Shapes raw per-file metadata into index records
 */
export class RecordBuilder {
  private options: BuildConfig;
  private logger: Logger;

  constructor(options: BuildConfig = DEFAULT_BUILD_CONFIG, logger: Logger = defaultLogger) {
    this.options = options;
    this.logger = logger;
  }

  public build(raw: RawFileMetadata): FileMetadataRecord {
    const file = this.buildFile(raw);
    const spatial = this.buildSpatial(raw);
    const temporal = this.buildTemporal(raw);
    const format = raw.data_format;

    return {
      file,
      ...(spatial ? { spatial } : {}),
      ...(temporal ? { temporal } : {}),
      parameters: flattenParameters(raw.parameters),
      ...(raw.data_processing_level !== undefined
        ? { data_processing_level: { level: raw.data_processing_level } }
        : {}),
      ...(raw.data_type !== undefined ? { data_type: { type: raw.data_type } } : {}),
      ...(format
        ? {
            data_format:
              format.version !== undefined
                ? { format: format.format, version: format.version }
                : { format: format.format },
          }
        : {}),
      ...(raw.misc && Object.keys(raw.misc).length > 0 ? { misc: { ...raw.misc } } : {}),
    };
  }

  private buildFile(raw: RawFileMetadata): FileSection {
    if (!raw.path || raw.path.trim() === '') {
      throw new Error('File metadata has no path');
    }
    if (raw.size === undefined) {
      throw new Error(`File metadata for ${raw.path} has no size`);
    }

    return {
      filename: path.basename(raw.path),
      path: raw.path,
      size: raw.size,
      corrupt: raw.corrupt ?? false,
      status: raw.status ?? this.options.defaultStatus,
    };
  }

  private buildSpatial(raw: RawFileMetadata): SpatialSection | undefined {
    if (!raw.spatial) return undefined;

    const spatial: SpatialSection = {};
    const geometries = this.buildGeometries(raw);
    if (geometries) spatial.geometries = geometries;

    const identifier = raw.spatial.identifier;
    if (identifier && Object.keys(identifier).length > 0) {
      spatial.identifier = { ...identifier };
    }

    return Object.keys(spatial).length > 0 ? spatial : undefined;
  }

  private buildGeometries(raw: RawFileMetadata): Geometries | undefined {
    if (!raw.spatial) return undefined;

    const { positions, dropped } = pairCoordinates(raw.spatial.lat, raw.spatial.lon);
    if (dropped > 0) {
      this.logger.warn(`${raw.path}: dropped ${dropped} coordinate pair(s) outside valid lat/lon range`);
    }
    if (positions.length === 0) return undefined;

    const bbox = boundingBox(positions);
    const geometries: Geometries = {
      type: raw.spatial.type ?? inferGeometryType(positions),
      coordinates: positions,
      bbox,
      hull: toHullOrder(bbox),
    };

    if (this.options.summary) {
      const summary = summarise(positions, this.options.summaryPoints);
      if (summary) geometries.summary = summary;
    }
    if (this.options.outline) {
      const polygon = outline(positions);
      if (polygon) geometries.outline = polygon;
    }

    return geometries;
  }

  private buildTemporal(raw: RawFileMetadata): TemporalSection | undefined {
    if (!raw.temporal) return undefined;

    const temporal: TemporalSection = {};
    const start = raw.temporal.start_time?.trim();
    const end = raw.temporal.end_time?.trim();
    if (start) temporal.start_time = start;
    if (end) temporal.end_time = end;

    if (start && end && start > end) {
      this.logger.warn(`${raw.path}: start_time ${start} is after end_time ${end}`);
    }

    return Object.keys(temporal).length > 0 ? temporal : undefined;
  }
}

/**
 * Build a single record with default options
 */
export function buildRecord(
  raw: RawFileMetadata,
  options?: BuildConfig,
  logger?: Logger
): FileMetadataRecord {
  return new RecordBuilder(options, logger).build(raw);
}
