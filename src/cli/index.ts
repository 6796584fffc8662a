#!/usr/bin/env node

import { Command } from 'commander';
import { createIndexer, MetadataIndexer } from '../core';
import { validateConfig } from '../config';
import { defaultLogger } from '../core/logger';
import { FileMetadataRecord } from '../types';

const program = new Command();

// Shared indexer instance for CLI commands
let indexer: MetadataIndexer;

function getIndexer(): MetadataIndexer {
  if (!indexer) {
    indexer = createIndexer(undefined, defaultLogger);
  }
  return indexer;
}

program
  .name('filemeta')
  .description('Build, validate and export file-metadata records for the archive index')
  .version('1.0.0');

/**
 * Build command
 */
program
  .command('build')
  .description('Build records from raw metadata files (YAML or JSON)')
  .argument('<inputs...>', 'Raw metadata files')
  .option('-b, --bulk', 'Emit a bulk-ingest (NDJSON) body instead of JSON')
  .option('-i, --index <name>', 'Index name for bulk action lines')
  .action((inputs: string[], options: { bulk?: boolean; index?: string }) => {
    const ix = getIndexer();
    const outcomes = ix.buildAll(inputs);

    const records: FileMetadataRecord[] = [];
    for (const outcome of outcomes) {
      if (outcome.record && outcome.errors.length === 0) {
        records.push(outcome.record);
      }
    }

    if (options.bulk) {
      process.stdout.write(ix.bulk(records, options.index));
    } else {
      console.log(JSON.stringify(records.length === 1 ? records[0] : records, null, 2));
    }

    const failed = outcomes.length - records.length;
    if (failed > 0) {
      defaultLogger.error(`${failed} of ${outcomes.length} input(s) failed`);
      process.exitCode = 1;
    }
  });

/**
 * Validate command
 */
program
  .command('validate')
  .description('Validate built records (JSON) against the record schema')
  .argument('<records...>', 'Record files')
  .action((records: string[]) => {
    const ix = getIndexer();
    let invalid = 0;

    records.forEach((file) => {
      const result = ix.validateFile(file);
      if (result.valid) {
        console.log(`✓ ${file}`);
        return;
      }
      invalid++;
      console.log(`✗ ${file}`);
      result.errors.forEach((err) => console.log(`    ${err}`));
    });

    if (invalid > 0) {
      console.log(`\n${invalid} of ${records.length} record(s) invalid.`);
      process.exitCode = 1;
    }
  });

/**
 * Mapping command
 */
program
  .command('mapping')
  .description('Print the index mapping derived from the record schema')
  .action(() => {
    console.log(JSON.stringify(getIndexer().mapping(), null, 2));
  });

/**
 * Schema command
 */
program
  .command('schema')
  .description('Print the record schema')
  .action(() => {
    console.log(JSON.stringify(getIndexer().schema(), null, 2));
  });

/**
 * Config command
 */
program
  .command('config')
  .description('Show the effective configuration')
  .action(() => {
    const config = getIndexer().getConfig();

    console.log('\n=== filemeta Configuration ===\n');
    console.log(`Index:          ${config.index.name}`);
    console.log(`Default status: ${config.build.defaultStatus}`);
    console.log(`Summary:        ${config.build.summary ? `on (${config.build.summaryPoints} points)` : 'off'}`);
    console.log(`Outline:        ${config.build.outline ? 'on' : 'off'}`);

    const errors = validateConfig(config);
    if (errors.length > 0) {
      console.log('\nProblems:');
      errors.forEach((err) => console.log(`  • ${err}`));
      process.exitCode = 1;
    }
    console.log('');
  });

// Parse arguments
program.parse();
