import { describe, expect, test } from 'vitest';
import { wordCount } from '../stats.js';

describe('wordCount', () => {
  test('counts words, lines and paragraphs', () => {
    const stats = wordCount('Hello world.\n\nSecond paragraph here.');

    expect(stats).toEqual({
      words: 5,
      characters: 36,
      charactersNoSpaces: 31,
      lines: 3,
      paragraphs: 2,
    });
  });

  test('trims before counting', () => {
    expect(wordCount('\n\n  two words  \n')).toEqual({
      words: 2,
      characters: 9,
      charactersNoSpaces: 8,
      lines: 1,
      paragraphs: 1,
    });
  });

  test('counts code points, not UTF-16 units', () => {
    const stats = wordCount('😀 ok');
    expect(stats.characters).toBe(4);
    expect(stats.charactersNoSpaces).toBe(3);
  });

  test('keeps tabs in charactersNoSpaces', () => {
    expect(wordCount('a\tb').charactersNoSpaces).toBe(3);
  });

  test('ignores whitespace-only paragraphs', () => {
    expect(wordCount('one\n\n   \n\ntwo').paragraphs).toBe(2);
  });

  test('reports one empty line for empty input', () => {
    expect(wordCount('   ')).toEqual({
      words: 0,
      characters: 0,
      charactersNoSpaces: 0,
      lines: 1,
      paragraphs: 0,
    });
  });

  test('returns a frozen record', () => {
    expect(Object.isFrozen(wordCount('x'))).toBe(true);
  });
});
