import { describe, expect, test } from 'vitest';
import { createCapitalizer } from '../capitalize.js';
import {
  removeDuplicateLines,
  reverseText,
  sortLines,
  toLowerCase,
  toTitleCase,
  toUpperCase,
  trimText,
} from '../transforms.js';

const samples = ['', 'Hello World', 'straße', 'ǅemal', '  padded\t\n', 'a😀b'];

describe('case folding', () => {
  test('uppercases and lowercases', () => {
    expect(toUpperCase('Hello World')).toBe('HELLO WORLD');
    expect(toLowerCase('Hello World')).toBe('hello world');
  });

  test('uses full case mapping', () => {
    expect(toUpperCase('straße')).toBe('STRASSE');
  });

  test('is idempotent', () => {
    for (const s of samples) {
      expect(toUpperCase(toUpperCase(s))).toBe(toUpperCase(s));
      expect(toLowerCase(toLowerCase(s))).toBe(toLowerCase(s));
    }
  });
});

describe('toTitleCase', () => {
  test('capitalizes each word and lowercases the rest', () => {
    expect(toTitleCase('hello WORLD')).toBe('Hello World');
  });

  test('preserves whitespace', () => {
    expect(toTitleCase("it's  a\ttest\n")).toBe("It's  A\tTest\n");
  });

  test('skips leading punctuation', () => {
    expect(toTitleCase('"quoted" (words)')).toBe('"Quoted" (Words)');
  });

  test('leaves words without letters alone', () => {
    expect(toTitleCase('42 -- ok')).toBe('42 -- Ok');
  });

  test('title-folds digraphs', () => {
    expect(toTitleCase('ǆungla ǅEMAL')).toBe('ǅungla ǅemal');
  });

  test('accepts another capitalizer', () => {
    expect(toTitleCase('istanbul izmir', createCapitalizer('tr'))).toBe('İstanbul İzmir');
  });
});

describe('reverseText', () => {
  test('reverses code points', () => {
    expect(reverseText('abc')).toBe('cba');
    expect(reverseText('a😀b')).toBe('b😀a');
  });

  test('is an involution', () => {
    for (const s of [...samples, '𝐀𝐁𝐂', '日本語']) {
      expect(reverseText(reverseText(s))).toBe(s);
    }
  });
});

describe('trimText', () => {
  test('removes leading and trailing whitespace', () => {
    expect(trimText('  padded\t\n')).toBe('padded');
  });

  test('removes Unicode spaces', () => {
    expect(trimText(' 　text ')).toBe('text');
  });

  test('is idempotent', () => {
    for (const s of samples) {
      expect(trimText(trimText(s))).toBe(trimText(s));
    }
  });
});

describe('removeDuplicateLines', () => {
  test('keeps the first occurrence of each line in order', () => {
    expect(removeDuplicateLines('a\nb\na\nc\nb')).toBe('a\nb\nc');
  });

  test('compares lines exactly', () => {
    expect(removeDuplicateLines('a\nA\na \na')).toBe('a\nA\na ');
  });

  test('collapses repeated blank lines', () => {
    expect(removeDuplicateLines('x\n\n\ny')).toBe('x\n\ny');
  });

  test('returns empty input unchanged', () => {
    expect(removeDuplicateLines('')).toBe('');
  });
});

describe('sortLines', () => {
  test('sorts ascending case-insensitively', () => {
    expect(sortLines('banana\nApple\ncherry', true)).toBe('Apple\nbanana\ncherry');
  });

  test('sorts descending', () => {
    expect(sortLines('banana\nApple\ncherry', false)).toBe('cherry\nbanana\nApple');
  });

  test('keeps input order for equal lines in both directions', () => {
    expect(sortLines('b\nA\nB\na', true)).toBe('A\na\nb\nB');
    expect(sortLines('b\nA\nB\na', false)).toBe('b\nB\nA\na');
  });

  test('orders astral characters after the rest of the BMP', () => {
    expect(sortLines('😀\n～\na', true)).toBe('a\n～\n😀');
    expect(sortLines('～\n😀', false)).toBe('😀\n～');
  });

  test('puts a prefix before longer lines', () => {
    expect(sortLines('abc\nab', true)).toBe('ab\nabc');
  });

  test('handles a single line', () => {
    expect(sortLines('only', true)).toBe('only');
  });
});
