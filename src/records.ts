/**
 * Event records produced upstream and handed to the cache as opaque JSON
 */

import * as core from '@actions/core';
import * as fs from 'fs';

export type RecordValue = string | number | boolean | null;

export interface EventRecord {
  id: string | number;
  [field: string]: RecordValue;
}

function isRecordValue(value: unknown): value is RecordValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one record. Throws with the offending position in the batch.
 */
export function toEventRecord(value: unknown, position = 0): EventRecord {
  if (!isPlainObject(value)) {
    throw new Error(`Record ${position} is not an object`);
  }

  const id = value.id;
  if (!(typeof id === 'number' || (typeof id === 'string' && id.length > 0))) {
    throw new Error(`Record ${position} has no usable "id" field`);
  }

  const record: EventRecord = {id};
  for (const [field, fieldValue] of Object.entries(value)) {
    if (!isRecordValue(fieldValue)) {
      throw new Error(
        `Record ${position} field "${field}" must be a string, number, boolean or null`
      );
    }
    // "__proto__" must land as an own data field
    Object.defineProperty(record, field, {
      value: fieldValue,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return record;
}

/**
 * Accepts either an array of records or `{"data": [...]}`
 */
export function parseRecords(document: unknown): EventRecord[] {
  const items = isPlainObject(document) ? document.data : document;

  if (!Array.isArray(items)) {
    throw new Error('Expected an array of records or an object with a "data" array');
  }

  return items.map((item: unknown, index) => toEventRecord(item, index));
}

/**
 * Read and validate records from JSON files, in file order
 */
export async function loadRecordFiles(files: string[]): Promise<EventRecord[]> {
  const records: EventRecord[] = [];

  for (const file of files) {
    core.debug(`Reading records from ${file}`);
    const content = await fs.promises.readFile(file, 'utf8');

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in ${file}: ${errorMsg}`);
    }

    try {
      const parsed = parseRecords(document);
      core.debug(`  ${parsed.length} records`);
      records.push(...parsed);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid records in ${file}: ${errorMsg}`);
    }
  }

  return records;
}
