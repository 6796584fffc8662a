import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { BuildConfig, FilemetaConfig, IndexConfig } from '../types';
import { Logger, defaultLogger } from '../core/logger';

/**
 * Default configuration for filemeta
 */
const DEFAULT_CONFIG: FilemetaConfig = {
  index: {
    name: 'file-metadata',
  },
  build: {
    summary: false,
    summaryPoints: 30,
    outline: false,
    defaultStatus: 'ingested',
  },
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.filemeta/config.yml',
  '.filemeta/config.yaml',
  'filemeta.yml',
  'filemeta.yaml',
];

/**
 * Environment variable overriding the target index name
 */
export const INDEX_ENV = 'FILEMETA_INDEX';

interface ConfigOverride {
  index?: Partial<IndexConfig>;
  build?: Partial<BuildConfig>;
}

/**
 * Load filemeta configuration from file or use defaults
 */
export function loadConfig(basePath?: string, logger: Logger = defaultLogger): FilemetaConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  let config = getDefaultConfig();
  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: ConfigOverride | null = yaml.parse(content);
        config = mergeConfig(DEFAULT_CONFIG, parsed ?? {});
        break;
      } catch (error) {
        logger.warn(`Failed to parse config at ${configPath}: ${error}`);
      }
    }
  }

  const indexOverride = process.env[INDEX_ENV];
  if (indexOverride) {
    config.index.name = indexOverride;
  }

  return config;
}

/**
 * Merge each section over the defaults; keys absent from the file keep their default
 */
function mergeConfig(defaults: FilemetaConfig, override: ConfigOverride): FilemetaConfig {
  return {
    index: { ...defaults.index, ...override.index },
    build: { ...defaults.build, ...override.build },
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): FilemetaConfig {
  return {
    index: { ...DEFAULT_CONFIG.index },
    build: { ...DEFAULT_CONFIG.build },
  };
}

// Index names are lowercase and may not contain these characters
const INDEX_NAME_FORBIDDEN = /[\\\/*?"<>| ,#:A-Z]/;

/**
 * Validate configuration
 */
export function validateConfig(config: FilemetaConfig): string[] {
  const errors: string[] = [];
  const name = config.index.name;

  if (!name) {
    errors.push('Index name must not be empty.');
  } else if (INDEX_NAME_FORBIDDEN.test(name) || /^[-_+]/.test(name) || name === '.' || name === '..') {
    errors.push(
      `Invalid index name: ${name}. Use lowercase characters without spaces or \\/*?"<>|,#: and do not start with -, _ or +.`
    );
  }

  const points = config.build.summaryPoints;
  if (!Number.isInteger(points) || points < 2) {
    errors.push(`Invalid summaryPoints: ${points}. Must be an integer of at least 2.`);
  }

  if (typeof config.build.defaultStatus !== 'string') {
    errors.push('defaultStatus must be a string.');
  }

  return errors;
}
