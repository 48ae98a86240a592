import type { TextStats } from './types.js';

function countCodePoints(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

/**
 * Count words, characters, lines and paragraphs of the trimmed text
 *
 * An empty input still has one (empty) line and zero paragraphs.
 *
 * @example
 * wordCount('Hello world.\n\nSecond paragraph here.')
 * // { words: 5, characters: 36, charactersNoSpaces: 31, lines: 3, paragraphs: 2 }
 */
export function wordCount(text: string): TextStats {
  const trimmed = text.trim();

  const words = trimmed.split(/\s+/).filter((word) => word.length > 0).length;
  const lines = trimmed.split('\n').length;
  const paragraphs = trimmed.split('\n\n').filter((p) => p.trim() !== '').length;
  const characters = countCodePoints(trimmed);
  const charactersNoSpaces = countCodePoints(trimmed.replaceAll(' ', '').replaceAll('\n', ''));

  return Object.freeze({
    words,
    characters,
    charactersNoSpaces,
    lines,
    paragraphs,
  });
}
