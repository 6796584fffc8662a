import { RecordValidator, checkRecordConsistency } from './validator';
import { buildRecord } from './record-builder';
import { Logger } from './logger';
import { FileMetadataRecord } from '../types';

describe('RecordValidator', () => {
  const silent: Logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  let validator: RecordValidator;
  let record: FileMetadataRecord;

  beforeAll(() => {
    validator = new RecordValidator();
  });

  beforeEach(() => {
    record = buildRecord(
      {
        path: '/archive/2014/scene001.dat',
        size: 204800,
        spatial: { type: 'LineString', lat: [51.0, 51.3], lon: [-1.0, -1.2] },
        temporal: { start_time: '2014-01-01T00:00:00Z', end_time: '2014-01-02T00:00:00Z' },
      },
      undefined,
      silent
    );
  });

  it('should accept a built record', () => {
    expect(validator.validate(record)).toEqual({ valid: true, errors: [] });
  });

  it('should accept an empty parameter list', () => {
    expect(record.parameters).toEqual([]);
    expect(validator.validate(record).valid).toBe(true);
  });

  it('should require file.path', () => {
    const result = validator.validate({
      file: { filename: 'scene001.dat', size: 1 },
      parameters: [],
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/file: must have required property 'path'"]);
  });

  it('should require path and filename to be strings', () => {
    const result = validator.validate({
      file: { filename: 7, path: '/a' },
      parameters: [],
    });

    expect(result.errors).toEqual(['/file/filename: must be string']);
  });

  it('should reject unknown top-level sections', () => {
    const result = validator.validate({ ...record, extra: true });

    expect(result.errors).toEqual(['/: must NOT have additional properties']);
  });

  it('should reject a bbox without four numbers', () => {
    const geometries = record.spatial?.geometries;
    const result = validator.validate({
      ...record,
      spatial: { geometries: { ...geometries, bbox: [-1.2, 51.0, -1.0] } },
    });

    expect(result.errors).toEqual(['/spatial/geometries/bbox: must NOT have fewer than 4 items']);
  });

  it('should reject a malformed time bound', () => {
    const result = validator.validate({ ...record, temporal: { start_time: 'yesterday' } });

    expect(result.errors).toEqual(['/temporal/start_time: must match format "date-time"']);
  });

  it('should reject a hull written in bbox order', () => {
    const geometries = record.spatial?.geometries;
    const result = validator.validate({
      ...record,
      spatial: { geometries: { ...geometries, hull: [-1.2, 51.0, -1.0, 51.3] } },
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        '/spatial/geometries/hull: expected [51, -1.2, 51.3, -1] ([lat, lon, lat2, lon2] of bbox), got [-1.2, 51, -1, 51.3]',
      ],
    });
  });

  it('should reject reversed time bounds', () => {
    const result = validator.validate({
      ...record,
      temporal: { start_time: '2014-01-02T00:00:00Z', end_time: '2014-01-01T00:00:00Z' },
    });

    expect(result.errors).toEqual([
      '/temporal: start_time 2014-01-02T00:00:00Z is after end_time 2014-01-01T00:00:00Z',
    ]);
  });

  it('should accept equal time bounds', () => {
    const result = validator.validate({
      ...record,
      temporal: { start_time: '2014-01-01T00:00:00Z', end_time: '2014-01-01T00:00:00Z' },
    });

    expect(result.valid).toBe(true);
  });
});

describe('checkRecordConsistency', () => {
  const base: FileMetadataRecord = {
    file: { filename: 'a.dat', path: '/a.dat', size: 1, corrupt: false },
    spatial: {
      geometries: {
        type: 'LineString',
        coordinates: [
          [-1.0, 51.0],
          [-1.2, 51.3],
        ],
        bbox: [-1.2, 51.0, -1.0, 51.3],
        hull: [51.0, -1.2, 51.3, -1.0],
      },
    },
    parameters: [],
  };

  it('should report nothing for a consistent record', () => {
    expect(checkRecordConsistency(base)).toEqual([]);
  });

  it('should report positions outside the bbox', () => {
    const errors = checkRecordConsistency({
      ...base,
      spatial: {
        geometries: {
          type: 'LineString',
          coordinates: [
            [-1.0, 51.0],
            [0.5, 52.0],
          ],
          bbox: [-1.2, 51.0, -1.0, 51.3],
          hull: [51.0, -1.2, 51.3, -1.0],
        },
      },
    });

    expect(errors).toEqual(['/spatial/geometries/coordinates: 1 position(s) outside bbox']);
  });

  it('should report an inverted bbox', () => {
    const errors = checkRecordConsistency({
      ...base,
      spatial: {
        geometries: {
          type: 'Point',
          coordinates: [],
          bbox: [-1.0, 51.3, -1.2, 51.0],
          hull: [51.3, -1.0, 51.0, -1.2],
        },
      },
    });

    expect(errors).toEqual([
      '/spatial/geometries/bbox: minimum exceeds maximum, expected [lon, lat, lon2, lat2]',
    ]);
  });

  it('should report a bbox out of range', () => {
    const errors = checkRecordConsistency({
      ...base,
      spatial: {
        geometries: {
          type: 'Point',
          coordinates: [],
          bbox: [51.0, -1.2, 51.3, 95.0],
          hull: [-1.2, 51.0, 95.0, 51.3],
        },
      },
    });

    expect(errors).toEqual(['/spatial/geometries/bbox: coordinates out of range']);
  });
});
