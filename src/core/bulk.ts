import { createHash } from 'crypto';
import { FileMetadataRecord } from '../types';

/**
 * Stable document id for a record: SHA-1 hex digest of the file path.
 * One archived file maps to exactly one document.
 */
export function documentId(filePath: string): string {
  return createHash('sha1').update(filePath, 'utf8').digest('hex');
}

/**
 * Bulk-ingest body: an index action line followed by the document, per record.
 */
export function toBulkBody(records: FileMetadataRecord[], indexName: string): string {
  const lines: string[] = [];
  for (const record of records) {
    lines.push(JSON.stringify({ index: { _index: indexName, _id: documentId(record.file.path) } }));
    lines.push(JSON.stringify(record));
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
