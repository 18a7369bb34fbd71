import { describe, it, expect } from 'vitest';
import { InvalidQueryConfiguration } from '../../lib/errors';
import { parseCommandArguments, tokenizeArguments } from '../commandArgs';

describe('tokenizeArguments', () => {
  it('splits at the first "=" and strips one pair of quotes', () => {
    expect(tokenizeArguments(['eaddr=es1:9200', 'query="status:500 AND path:/a=b"', "tsfield='ts'"])).toEqual({
      eaddr: 'es1:9200',
      query: 'status:500 AND path:/a=b',
      tsfield: 'ts',
    });
  });

  it('keeps the last value of a repeated key', () => {
    expect(tokenizeArguments(['index=one', 'index=two'])).toEqual({ index: 'two' });
  });

  it.each(['index', '=logs', ' =x'])('rejects the malformed token %j', (token) => {
    expect(() => tokenizeArguments([token])).toThrow(`Malformed argument "${token}". Expected key=value.`);
  });
});

describe('parseCommandArguments', () => {
  it('applies defaults', () => {
    expect(parseCommandArguments(['eaddr=es1', 'index=logs'])).toEqual({
      eaddr: 'es1',
      index: 'logs',
      query: '*',
      fields: undefined,
      include_es: false,
      include_raw: false,
      scan: true,
    });
  });

  it('parses lists, numbers and booleans', () => {
    const args = parseCommandArguments([
      'eaddr=es1',
      'index=logs',
      'fields=host, status,,bytes',
      'limit=500',
      'page_size=100',
      'include_es=yes',
      'include_raw=1',
      'use_ssl=t',
      'verify_certs=false',
      'action=cluster-health',
      'scan=no',
    ]);

    expect(args).toMatchObject({
      fields: ['host', 'status', 'bytes'],
      limit: 500,
      page_size: 100,
      include_es: true,
      include_raw: true,
      use_ssl: true,
      verify_certs: false,
      action: 'cluster-health',
      scan: false,
    });
  });

  it('names a missing required argument', () => {
    expect(() => parseCommandArguments(['index=logs'])).toThrow('Missing required argument: eaddr');
  });

  it('names unknown arguments', () => {
    expect(() => parseCommandArguments(['eaddr=es1', 'idx=logs', 'qry=*'])).toThrow(
      'Unknown argument(s): idx, qry',
    );
  });

  it.each([
    ['limit=0', 'Invalid value for limit: Number must be greater than or equal to 1'],
    ['limit=ten', 'Invalid value for limit: Expected a positive integer'],
    ['page_size=20000', 'Invalid value for page_size: Number must be less than or equal to 10000'],
    ['include_es=maybe', 'Invalid value for include_es'],
    ['scan=sometimes', 'Invalid value for scan'],
    ['action=drop', 'Invalid value for action'],
  ])('rejects %s', (token, message) => {
    const error = (() => {
      try {
        parseCommandArguments(['eaddr=es1', token]);
      } catch (e: unknown) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(InvalidQueryConfiguration);
    expect(error).toHaveProperty('message', expect.stringContaining(message));
  });
});
