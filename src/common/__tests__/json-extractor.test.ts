/**
 * Jest Unit Tests for JSON Extraction
 *
 * Tests object extraction from model output and field recovery from
 * malformed JSON.
 */

import {
  extractJsonObject,
  extractStringField,
  extractStringArrayField,
  isRecord,
} from '../utils/json-extractor.js';

describe('JSON Extractor', () => {
  // ==========================================================================
  // OBJECT EXTRACTION
  // ==========================================================================

  describe('extractJsonObject', () => {
    test('parses plain JSON', () => {
      expect(extractJsonObject('{"a": 1}')).toEqual({ a: 1 });
    });

    test('strips code fences', () => {
      expect(extractJsonObject('```json\n{"a": "x"}\n```')).toEqual({ a: 'x' });
    });

    test('cuts the object out of surrounding prose', () => {
      expect(extractJsonObject('Here you go: {"a": 1} thanks')).toEqual({ a: 1 });
    });

    test('keeps nested braces inside strings', () => {
      expect(extractJsonObject('note {"a": "{x}", "b": {"c": 2}} end')).toEqual({
        a: '{x}',
        b: { c: 2 },
      });
    });

    test('escapes raw newlines inside strings', () => {
      expect(extractJsonObject('{"a": "line1\nline2"}')).toEqual({ a: 'line1\nline2' });
    });

    test('drops trailing commas', () => {
      expect(extractJsonObject('{"a": [1, 2,], "b": 3,}')).toEqual({ a: [1, 2], b: 3 });
    });

    test('returns undefined for arrays', () => {
      expect(extractJsonObject('[1, 2]')).toBeUndefined();
    });

    test('returns undefined for text without an object', () => {
      expect(extractJsonObject('no json here')).toBeUndefined();
    });

    test('returns undefined for blank text', () => {
      expect(extractJsonObject('   ')).toBeUndefined();
    });
  });

  // ==========================================================================
  // FIELD RECOVERY
  // ==========================================================================

  describe('extractStringField', () => {
    test('recovers a string value from broken JSON', () => {
      const text = '{"business_answer": "Use \\"PK-1\\" now", "key_findings": [';
      expect(extractStringField(text, 'business_answer')).toBe('Use "PK-1" now');
    });

    test('returns undefined when the field is missing', () => {
      expect(extractStringField('{"other": "x"', 'business_answer')).toBeUndefined();
    });

    test('returns undefined for an empty value', () => {
      expect(extractStringField('{"business_answer": ""', 'business_answer')).toBeUndefined();
    });
  });

  describe('extractStringArrayField', () => {
    test('recovers non-empty items', () => {
      const text = '{"key_findings": ["one", "", "two"], "broken';
      expect(extractStringArrayField(text, 'key_findings')).toEqual(['one', 'two']);
    });

    test('returns an empty list for an unterminated array', () => {
      expect(extractStringArrayField('{"key_findings": ["one", "two",', 'key_findings')).toEqual([]);
    });
  });

  describe('isRecord', () => {
    test('accepts plain objects only', () => {
      expect(isRecord({})).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });
});
