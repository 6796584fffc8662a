import * as fs from 'fs';
import * as path from 'path';
import { RecordValidator } from '../src/core/validator';
import { RawMetadataReader } from '../src/core/reader';
import { RecordBuilder, DEFAULT_BUILD_CONFIG } from '../src/core/record-builder';
import { Logger } from '../src/core/logger';

const ASSETS = path.join(__dirname, 'assets');

const listFixtures = (dir: string): string[] =>
  fs
    .readdirSync(path.join(ASSETS, dir))
    .filter((f) => f.endsWith('.json'))
    .sort();

const readJson = (dir: string, name: string): unknown =>
  JSON.parse(fs.readFileSync(path.join(ASSETS, dir, name), 'utf-8'));

describe('Contract Compliance (Schema Validation)', () => {
  let validator: RecordValidator;

  beforeAll(() => {
    validator = new RecordValidator();
  });

  it.each(listFixtures('records/valid'))('accepts records/valid/%s', (name) => {
    expect(validator.validate(readJson('records/valid', name))).toEqual({ valid: true, errors: [] });
  });

  it('rejects a hull written in bbox order', () => {
    const result = validator.validate(readJson('records/invalid', 'hull-in-bbox-order.json'));

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^\/spatial\/geometries\/hull: /);
  });

  it('rejects reversed time bounds', () => {
    const result = validator.validate(readJson('records/invalid', 'time-reversed.json'));

    expect(result.errors).toEqual([
      '/temporal: start_time 2014-01-02T00:00:00Z is after end_time 2014-01-01T00:00:00Z',
    ]);
  });

  it('rejects a record without file.path', () => {
    const result = validator.validate(readJson('records/invalid', 'missing-path.json'));

    expect(result.errors).toEqual(["/file: must have required property 'path'"]);
  });

  it('rejects parameters given as a map', () => {
    const result = validator.validate(readJson('records/invalid', 'parameters-as-map.json'));

    expect(result.errors).toEqual(['/parameters: must be array']);
  });
});

describe('Contract Compliance (Raw metadata to record)', () => {
  const silent: Logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };

  it('builds the published scene001 record from its raw metadata', () => {
    const reader = new RawMetadataReader();
    const builder = new RecordBuilder(DEFAULT_BUILD_CONFIG, silent);

    const record = builder.build(reader.read(path.join(ASSETS, 'raw', 'scene001.yml')));

    expect(record).toEqual(readJson('records/valid', 'scene001.json'));
    expect(Object.keys(record)).toEqual([
      'file',
      'spatial',
      'temporal',
      'parameters',
      'data_processing_level',
      'data_type',
      'data_format',
    ]);
  });
});
