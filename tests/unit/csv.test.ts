import { escapeCsvField, toCsv, UTF8_BOM } from '@/utils/csv';

describe('csv (unit)', () => {
  test('leaves plain values untouched', () => {
    expect(escapeCsvField('plain text')).toBe('plain text');
    expect(escapeCsvField(42)).toBe('42');
  });

  test('writes null and undefined as empty fields', () => {
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(undefined)).toBe('');
  });

  /**
   * Purpose:
   * Verifies minimal quoting:
   * - commas, quotes and line breaks force quotes
   * - embedded quotes are doubled
   */
  test('quotes fields that would break the row', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
    expect(escapeCsvField('carriage\rreturn')).toBe('"carriage\rreturn"');
  });

  test('serializes rows in header order', () => {
    const csv = toCsv(['b', 'a'], [
      { a: 1, b: 'x' },
      { a: null, b: 'y,z' },
    ]);

    expect(csv).toBe('b,a\nx,1\n"y,z",\n');
  });

  test('prefixes a BOM on request', () => {
    expect(toCsv(['a'], [], { bom: true })).toBe(`${UTF8_BOM}a\n`);
  });
});
