import { describe, it, expect } from 'vitest';
import { toEpochSeconds, toRecord } from '../records';
import { ResultDocument } from '../scrollIterator';

const document: ResultDocument = {
  index: 'logs-2024.01.15',
  id: 'abc',
  score: 1.5,
  source: {
    '@timestamp': '2024-01-15T10:00:00.000Z',
    host: { name: 'web-1' },
    status: 200,
  },
};

const plain = { timestampField: '@timestamp', includeClusterMeta: false, includeRaw: false };

describe('toEpochSeconds', () => {
  it('parses date strings and scales epoch milliseconds', () => {
    expect(toEpochSeconds('2024-01-15T10:00:00Z')).toBe(1705312800);
    expect(toEpochSeconds(1705312800123)).toBe(1705312800.123);
  });

  it('reads an all-digit string as epoch milliseconds', () => {
    expect(toEpochSeconds('1705312800123')).toBe(1705312800.123);
    expect(toEpochSeconds('0')).toBe(0);
  });

  it('passes unparseable values through', () => {
    expect(toEpochSeconds('not a date')).toBe('not a date');
  });
});

describe('toRecord', () => {
  it('moves the timestamp field to _time and flattens the rest', () => {
    expect(toRecord(document, plain)).toEqual({
      _time: 1705312800,
      'host.name': 'web-1',
      status: 200,
    });
  });

  it('reads a nested timestamp field by its dotted path', () => {
    const nested: ResultDocument = { ...document, source: { event: { created: 1705312800000 } } };
    expect(toRecord(nested, { ...plain, timestampField: 'event.created' })).toEqual({ _time: 1705312800 });
  });

  it('converts a timestamp stored as a string of epoch milliseconds', () => {
    const stringly: ResultDocument = { ...document, source: { '@timestamp': '1705312800000', status: 200 } };
    expect(toRecord(stringly, plain)).toEqual({ _time: 1705312800, status: 200 });
  });

  it('leaves _time out when the document has no timestamp', () => {
    const untimed: ResultDocument = { ...document, source: { status: 404 } };
    expect(toRecord(untimed, plain)).toEqual({ status: 404 });
  });

  it('adds cluster metadata on request', () => {
    const record = toRecord({ ...document, score: null, type: '_doc' }, { ...plain, includeClusterMeta: true });

    expect(record).toMatchObject({
      es_index: 'logs-2024.01.15',
      es_id: 'abc',
      es_score: '',
      es_type: '_doc',
    });
  });

  it('omits es_type when the cluster reports none', () => {
    const record = toRecord(document, { ...plain, includeClusterMeta: true });

    expect(record.es_score).toBe(1.5);
    expect(Object.hasOwn(record, 'es_type')).toBe(false);
  });

  it('adds the whole hit as _raw on request', () => {
    const record = toRecord(document, { ...plain, includeRaw: true });

    expect(JSON.parse(String(record._raw))).toEqual({
      _index: 'logs-2024.01.15',
      _id: 'abc',
      _score: 1.5,
      _source: {
        '@timestamp': '2024-01-15T10:00:00.000Z',
        host: { name: 'web-1' },
        status: 200,
      },
    });
  });
});
