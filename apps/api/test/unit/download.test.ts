import { describe, it, expect } from 'vitest';
import { buildCsv, contentDisposition, escapeCsvField } from '../../src/lib/download.js';

describe('contentDisposition', () => {
  it('repeats an ASCII filename in both parameters', () => {
    expect(contentDisposition('careplan_100200_IVIG_2026-03-10.txt')).toBe(
      `attachment; filename="careplan_100200_IVIG_2026-03-10.txt"; filename*=UTF-8''careplan_100200_IVIG_2026-03-10.txt`,
    );
  });

  it('keeps non-Latin-1 characters out of the plain filename', () => {
    const header = contentDisposition('careplan_100200_Humira™_Pen_2026-03-10.txt');
    expect(header).toBe(
      `attachment; filename="careplan_100200_Humira__Pen_2026-03-10.txt"; filename*=UTF-8''careplan_100200_Humira%E2%84%A2_Pen_2026-03-10.txt`,
    );
    expect([...header].every((c) => c.charCodeAt(0) < 0x80)).toBe(true);
  });

  it('cannot be broken out of by quotes or separators', () => {
    expect(contentDisposition(`a";b'(c).csv`)).toBe(
      `attachment; filename="a__b__c_.csv"; filename*=UTF-8''a%22%3Bb%27%28c%29.csv`,
    );
  });
});

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('IVIG')).toBe('IVIG');
  });

  it('quotes commas, quotes and newlines', () => {
    expect(escapeCsvField('Lane, Ada')).toBe('"Lane, Ada"');
    expect(escapeCsvField('5 "units"')).toBe('"5 ""units"""');
    expect(escapeCsvField('line one\nline two')).toBe('"line one\nline two"');
    expect(escapeCsvField('a\rb')).toBe('"a\rb"');
  });
});

describe('buildCsv', () => {
  it('writes numbers as-is and ends with a newline', () => {
    expect(buildCsv(['name', 'total'], [['Lane, Ada', 3], ['IVIG', 0]])).toBe(
      'name,total\n"Lane, Ada",3\nIVIG,0\n',
    );
  });
});
