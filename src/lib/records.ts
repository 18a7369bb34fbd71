/**
 * Conversion of search hits into the records emitted to the host platform.
 *
 * @module
 */
import { FlatRecord, FlatValue, flattenDocument } from './flatten';
import { ResultDocument } from './scrollIterator';

export interface RecordOptions {
  /** Field whose value becomes the record's `_time`. */
  timestampField: string;
  /** Add `es_index`, `es_id`, `es_score` and, when present, `es_type`. */
  includeClusterMeta: boolean;
  /** Add `_raw`, the JSON text of the whole hit. */
  includeRaw: boolean;
  maxDepth?: number;
}

/**
 * Converts a timestamp value to epoch seconds. Strings are parsed as dates;
 * numbers are taken as epoch milliseconds, the cluster's default date format.
 * Values that are neither are passed through.
 */
export function toEpochSeconds(value: FlatValue): FlatValue {
  if (typeof value === 'number') {
    return value / 1000;
  }
  // epoch_millis values indexed as strings
  if (/^\d+$/.test(value)) {
    return Number(value) / 1000;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? value : parsed / 1000;
}

export function toRecord(document: ResultDocument, options: RecordOptions): FlatRecord {
  const fields = flattenDocument(document.source, { maxDepth: options.maxDepth });
  let record: FlatRecord;

  if (Object.hasOwn(fields, options.timestampField)) {
    const time = toEpochSeconds(fields[options.timestampField]);
    delete fields[options.timestampField];
    record = { _time: time, ...fields };
  } else {
    record = { ...fields };
  }

  if (options.includeClusterMeta) {
    record.es_index = document.index;
    record.es_id = document.id;
    record.es_score = document.score ?? '';
    if (document.type !== undefined) {
      record.es_type = document.type;
    }
  }

  if (options.includeRaw) {
    record._raw = JSON.stringify({
      _index: document.index,
      _id: document.id,
      _score: document.score,
      ...(document.type !== undefined ? { _type: document.type } : {}),
      _source: document.source,
    });
  }

  return record;
}
