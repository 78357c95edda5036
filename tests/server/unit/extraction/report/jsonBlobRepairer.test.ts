import { describe, expect, it } from 'vitest';
import {
  JSON_BLOB_REPAIR_RULES,
  quoteBareKeys,
  repairJsonBlob,
  singleToDoubleQuotes,
  tightenStringValues,
  trimOuterQuotes,
  unescapeQuotesAndWhitespace,
  type JsonBlobRepairRule,
} from '../../../../../src/server/extraction/report/jsonBlobRepairer.js';

describe('repair rules', () => {
  it('trims one matching pair of surrounding quotes', () => {
    expect(trimOuterQuotes.apply('"{"a":1}"')).toBe('{"a":1}');
    expect(trimOuterQuotes.apply("'abc'")).toBe('abc');
    expect(trimOuterQuotes.apply('  {}  ')).toBe('{}');
  });

  it('leaves mismatched outer quotes alone', () => {
    expect(trimOuterQuotes.apply('"abc\'')).toBe('"abc\'');
  });

  it('unescapes quotes and turns escaped whitespace into spaces', () => {
    expect(unescapeQuotesAndWhitespace.apply('{\\"a\\":\\"b\\"}')).toBe('{"a":"b"}');
    expect(unescapeQuotesAndWhitespace.apply('a\\nb\\tc')).toBe('a b c');
  });

  it('quotes bare object keys', () => {
    expect(quoteBareKeys.apply('{pytest: "8.3.3", pluggy-x: 1}')).toBe('{"pytest": "8.3.3", "pluggy-x": 1}');
    expect(quoteBareKeys.apply('{"a": 1}')).toBe('{"a": 1}');
  });

  it('removes whitespace between a colon and a string value', () => {
    expect(tightenStringValues.apply('{"a": "x", "b":   "y"}')).toBe('{"a":"x", "b":"y"}');
  });

  it('converts single quotes to double quotes', () => {
    expect(singleToDoubleQuotes.apply("{'a': 'b'}")).toBe('{"a": "b"}');
  });

  it('applies the rules in a fixed order', () => {
    expect(JSON_BLOB_REPAIR_RULES.map((rule) => rule.name)).toEqual([
      'trim-outer-quotes',
      'unescape-quotes-and-whitespace',
      'quote-bare-keys',
      'tighten-string-values',
      'single-to-double-quotes',
    ]);
  });
});

describe('repairJsonBlob', () => {
  it('repairs bare keys and mixed quoting', () => {
    const repaired = repairJsonBlob(`{pytest:"8.3.3", pluggy:'1.5.0'}`);
    expect(repaired).toBe('{"pytest":"8.3.3", "pluggy":"1.5.0"}');
    expect(JSON.parse(repaired)).toEqual({ pytest: '8.3.3', pluggy: '1.5.0' });
  });

  it('repairs a quoted blob with escaped inner quotes', () => {
    const repaired = repairJsonBlob('"{\\"environment\\": {\\"Python\\": \\"3.11.9\\"}}"');
    expect(JSON.parse(repaired)).toEqual({ environment: { Python: '3.11.9' } });
  });

  it('leaves valid JSON parseable to the same value', () => {
    const blob = '{"environment": {"Python": "3.12.4", "Base URL": "https://api.example.test"}}';
    expect(JSON.parse(repairJsonBlob(blob))).toEqual(JSON.parse(blob));
  });

  it('returns the text from before a failing rule', () => {
    const rules: JsonBlobRepairRule[] = [
      { name: 'upper', apply: (text) => text.toUpperCase() },
      {
        name: 'boom',
        apply: () => {
          throw new Error('boom');
        },
      },
      { name: 'never', apply: () => 'never' },
    ];
    expect(repairJsonBlob('abc', rules)).toBe('ABC');
  });
});
