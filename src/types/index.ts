import type { LineString, Polygon } from 'geojson';

/**
 * GeoJSON geometry types a record can declare for its coordinate list
 */
export type GeometryType =
  | 'Point'
  | 'MultiPoint'
  | 'LineString'
  | 'MultiLineString'
  | 'Polygon'
  | 'MultiPolygon';

/**
 * A single position, longitude first (GeoJSON order)
 */
export type Position = [number, number];

/**
 * Bounding box in `[lon, lat, lon2, lat2]` order:
 * minimum longitude, minimum latitude, maximum longitude, maximum latitude.
 */
export type BoundingBox = [number, number, number, number];

/**
 * Hull extent in `[lat, lon, lat2, lon2]` order:
 * minimum latitude, minimum longitude, maximum latitude, maximum longitude.
 *
 * EXTERNAL CONTRACT: the axis order differs from {@link BoundingBox}.
 * Consumers of the index rely on it, so never share one ordering for both.
 */
export type HullEnvelope = [number, number, number, number];

/**
 * Archive bookkeeping for the file a record describes
 */
export interface FileSection {
  filename: string;
  path: string;
  size: number;
  corrupt: boolean;
  status?: string;
}

export interface Geometries {
  type: GeometryType;
  coordinates: Position[];
  bbox: BoundingBox;
  hull: HullEnvelope;
  summary?: LineString;
  outline?: Polygon;
}

/**
 * Spatial reference identifiers (grid cell, scene naming, etc.)
 */
export interface SpatialIdentifier {
  abs_id?: string;
  rel_id?: string;
  x_id?: number;
  y_id?: number;
  format?: string;
  location_name?: string;
}

export interface SpatialSection {
  geometries?: Geometries;
  identifier?: SpatialIdentifier;
}

/**
 * ISO 8601 time bounds, kept as strings
 */
export interface TemporalSection {
  start_time?: string;
  end_time?: string;
}

export interface ParameterItem {
  name: string;
  value: string;
}

export interface DataProcessingLevel {
  level: string;
}

export interface DataTypeTag {
  type: string;
}

export interface DataFormat {
  format: string;
  version?: string;
}

/**
 * One record per archived data file, as stored in the document index
 */
export interface FileMetadataRecord {
  file: FileSection;
  spatial?: SpatialSection;
  temporal?: TemporalSection;
  parameters: ParameterItem[];
  data_processing_level?: DataProcessingLevel;
  data_type?: DataTypeTag;
  data_format?: DataFormat;
  misc?: Record<string, unknown>;
}

/**
 * A parameter as reported by a format reader: a variable name plus its attributes
 */
export interface RawParameter {
  name: string;
  attributes?: Record<string, string | number | boolean>;
}

/**
 * Metadata extracted from a data file before it is shaped into a record.
 * Latitudes and longitudes are parallel lists.
 */
export interface RawFileMetadata {
  path: string;
  size?: number;
  corrupt?: boolean;
  status?: string;
  spatial?: {
    lat: number[];
    lon: number[];
    type?: GeometryType;
    identifier?: SpatialIdentifier;
  };
  temporal?: TemporalSection;
  parameters?: RawParameter[];
  data_processing_level?: string;
  data_type?: string;
  data_format?: DataFormat;
  misc?: Record<string, unknown>;
}

/**
 * Result of a structural or consistency check
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Outcome of building one record from one input file
 */
export interface BuildOutcome {
  source: string;
  record?: FileMetadataRecord;
  errors: string[];
}

/**
 * Options that shape how records are built
 */
export interface BuildConfig {
  /** Attach a sampled LineString summary of the coordinates */
  summary: boolean;
  /** Upper bound on summary positions */
  summaryPoints: number;
  /** Attach the convex hull polygon when enough positions exist */
  outline: boolean;
  /** Status written when the input carries none */
  defaultStatus: string;
}

export interface IndexConfig {
  name: string;
}

/**
 * filemeta configuration
 */
export interface FilemetaConfig {
  index: IndexConfig;
  build: BuildConfig;
}

/**
 * Field mapping in an index mapping body
 */
export interface FieldMapping {
  type: string;
  properties?: Record<string, FieldMapping>;
  fields?: Record<string, FieldMapping>;
  enabled?: boolean;
}

export interface IndexMapping {
  mappings: {
    dynamic: 'strict';
    properties: Record<string, FieldMapping>;
  };
}
