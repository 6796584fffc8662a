import { FieldMapping, IndexMapping } from '../types';
import { JsonSchema } from './schemas';

const TEXT_WITH_RAW: FieldMapping = { type: 'text', fields: { raw: { type: 'keyword' } } };

/**
 * Fields whose index mapping cannot be derived from their JSON type alone,
 * keyed by dotted field path.
 */
const FIELD_OVERRIDES: Record<string, FieldMapping> = {
  'file.filename': TEXT_WITH_RAW,
  'file.path': TEXT_WITH_RAW,
  'spatial.geometries.summary': { type: 'geo_shape' },
  'spatial.geometries.outline': { type: 'geo_shape' },
  misc: { type: 'object', enabled: false },
};

function primaryType(node: JsonSchema): string | undefined {
  if (Array.isArray(node.type)) {
    return node.type.find((t) => t !== 'null');
  }
  return node.type;
}

function cloneMapping(mapping: FieldMapping): FieldMapping {
  return JSON.parse(JSON.stringify(mapping));
}

function mapProperties(
  properties: Record<string, JsonSchema>,
  parentPath: string
): Record<string, FieldMapping> {
  const mapped: Record<string, FieldMapping> = {};
  for (const [name, child] of Object.entries(properties)) {
    mapped[name] = mapField(child, parentPath ? `${parentPath}.${name}` : name);
  }
  return mapped;
}

function mapField(node: JsonSchema, fieldPath: string): FieldMapping {
  const override = FIELD_OVERRIDES[fieldPath];
  if (override) return cloneMapping(override);

  switch (primaryType(node)) {
    case 'object':
      return node.properties
        ? { type: 'object', properties: mapProperties(node.properties, fieldPath) }
        : { type: 'object', enabled: false };
    case 'array': {
      if (!node.items) return { type: 'keyword' };
      const item = mapField(node.items, fieldPath);
      // Objects inside arrays keep their pairing only as nested documents
      return item.type === 'object' && item.properties ? { ...item, type: 'nested' } : item;
    }
    case 'string':
      return node.format === 'date-time' ? { type: 'date' } : { type: 'keyword' };
    case 'integer':
      return { type: 'long' };
    case 'number':
      return { type: 'double' };
    case 'boolean':
      return { type: 'boolean' };
    default:
      return { type: 'keyword' };
  }
}

/**
 * Derive an index mapping body from the record schema
 */
export function buildIndexMapping(schema: JsonSchema): IndexMapping {
  if (primaryType(schema) !== 'object' || !schema.properties) {
    throw new Error('Record schema must describe an object with properties');
  }

  return {
    mappings: {
      dynamic: 'strict',
      properties: mapProperties(schema.properties, ''),
    },
  };
}
