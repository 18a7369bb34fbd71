import { describe, it, expect } from 'vitest';
import { validateFieldName, validateIndexName } from '../inputSanitizer';

describe('inputSanitizer', () => {
  describe('validateIndexName', () => {
    it('allows simple index names', () => {
      expect(() => validateIndexName('logs')).not.toThrow();
      expect(() => validateIndexName('logs-2024')).not.toThrow();
      expect(() => validateIndexName('logs-*')).not.toThrow();
      expect(() => validateIndexName('.internal')).not.toThrow();
      expect(() => validateIndexName('index_name')).not.toThrow();
      expect(() => validateIndexName('logs-2024.01,logs-2024.02')).not.toThrow();
    });

    it('rejects empty index names', () => {
      expect(() => validateIndexName('')).toThrow(/Invalid index name/);
    });

    it('rejects index names with path traversal', () => {
      expect(() => validateIndexName('../etc/passwd')).toThrow(/Invalid index name/);
      expect(() => validateIndexName('..')).toThrow(/Invalid index name/);
      expect(() => validateIndexName('logs,.')).toThrow(/Invalid index name/);
    });

    it('rejects index names with special characters', () => {
      expect(() => validateIndexName('logs<script>')).toThrow(/Invalid index name/);
      expect(() => validateIndexName('logs;rm -rf')).toThrow(/Invalid index name/);
      expect(() => validateIndexName('logs?scroll=1m')).toThrow(/Invalid index name/);
    });
  });

  describe('validateFieldName', () => {
    it('allows dotted, prefixed and wildcard field paths', () => {
      expect(() => validateFieldName('@timestamp')).not.toThrow();
      expect(() => validateFieldName('event.created')).not.toThrow();
      expect(() => validateFieldName('http.*')).not.toThrow();
    });

    it('rejects whitespace, commas and quotes', () => {
      expect(() => validateFieldName('')).toThrow('Invalid field name ""');
      expect(() => validateFieldName('a b')).toThrow(/Invalid field name/);
      expect(() => validateFieldName('a,b')).toThrow(/Invalid field name/);
      expect(() => validateFieldName("o'brien")).toThrow(/Invalid field name/);
    });
  });
});
