import { describe, it, expect } from 'vitest';
import { buildCsvContent, csvCell } from '../csv.js';
import { fileTimestamp, isoDay, logTime } from '../timestamp.js';

describe('csv', () => {
  it('quotes cells that need it and joins lists', () => {
    expect(csvCell('a,b')).toBe('"a,b"');
    expect(csvCell('say "hi"')).toBe('"say ""hi"""');
    expect(csvCell(['x', 'y'])).toBe('x; y');
    expect(csvCell(undefined)).toBe('');
    expect(csvCell(0)).toBe('0');
  });

  it('writes a header and one line per row', () => {
    const content = buildCsvContent([{ a: 1, b: 'x' }, { a: 2 }], [
      { key: 'a', header: 'A' },
      { key: 'b', header: 'B' },
    ]);
    expect(content).toBe('A,B\n1,x\n2,');
  });
});

describe('timestamps', () => {
  const date = new Date(2024, 0, 2, 3, 4, 5, 6);

  it('formats sortable file timestamps', () => {
    expect(fileTimestamp(date)).toBe('20240102_030405_006');
    expect(logTime(date)).toBe('03:04:05');
  });

  it('extracts the day from ISO dates', () => {
    expect(isoDay('2024-05-01T07:00:00Z')).toBe('2024-05-01');
    expect(isoDay('May 1')).toBeNull();
    expect(isoDay(undefined)).toBeNull();
  });
});
