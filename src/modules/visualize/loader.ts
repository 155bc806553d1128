import fs from 'node:fs';
import { getLogger } from '../../utils/logger.js';
import { RecordLoadError } from './errors.js';
import type { RawRecord } from './types.js';

const log = getLogger();

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false; // not a path (or not one we can see): treat as JSON text
  }
}

function isRawRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load tweet records from a JSON file path, or from the JSON text itself
 * when `source` does not name an existing file.
 *
 * Parse errors propagate as `SyntaxError`. Elements are not validated here;
 * missing fields surface when the report is rendered.
 */
export function loadTweetRecords(source: string): RawRecord[] {
  const fromFile = isFile(source);
  const text = fromFile ? fs.readFileSync(source, 'utf-8') : source;
  const decoded: unknown = JSON.parse(text);

  if (!Array.isArray(decoded)) {
    throw new RecordLoadError(
      `Expected a JSON array of tweet records${fromFile ? ` in ${source}` : ''}, got ${describeJson(decoded)}`
    );
  }

  // Non-object elements become empty records and fail at render time
  const records = decoded.map((item: unknown): RawRecord => (isRawRecord(item) ? item : {}));

  log.debug({ count: records.length, fromFile }, 'Tweet records loaded');
  return records;
}

function describeJson(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return 'an object';
  return typeof value;
}
