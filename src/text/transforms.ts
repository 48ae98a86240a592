/**
 * Leaf transforms over whole strings. None of these look at tokens.
 */

import { englishCapitalizer } from './capitalize.js';
import type { Capitalizer } from './types.js';

const FIRST_LETTER = /\p{L}/u;

export function toUpperCase(text: string): string {
  return text.toUpperCase();
}

export function toLowerCase(text: string): string {
  return text.toLowerCase();
}

/**
 * Capitalize the first letter of each whitespace-separated word and
 * lowercase the rest
 *
 * Leading punctuation is skipped, so '"quoted"' becomes '"Quoted"'.
 *
 * @example
 * toTitleCase('hello WORLD')  // 'Hello World'
 * toTitleCase("it's  a test") // "It's  A Test" (whitespace preserved)
 */
export function toTitleCase(text: string, capitalize: Capitalizer = englishCapitalizer): string {
  return text.toLowerCase().replace(/\S+/g, (word) => {
    const start = word.search(FIRST_LETTER);
    if (start === -1) return word;
    return word.slice(0, start) + capitalize(word.slice(start));
  });
}

/**
 * Reverse by code point, so astral characters such as emoji stay intact
 *
 * @example
 * reverseText('abc')   // 'cba'
 * reverseText('a😀b') // 'b😀a'
 */
export function reverseText(text: string): string {
  return [...text].reverse().join('');
}

export function trimText(text: string): string {
  return text.trim();
}

/**
 * Drop repeated lines, keeping the first occurrence of each
 *
 * Comparison is exact: 'a' and 'A ' are different lines.
 *
 * @example
 * removeDuplicateLines('a\nb\na\nc\nb') // 'a\nb\nc'
 */
export function removeDuplicateLines(text: string): string {
  return [...new Set(text.split('\n'))].join('\n');
}

function codePoints(text: string): number[] {
  return Array.from(text, (char) => char.codePointAt(0) ?? 0);
}

function compareCodePoints(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

/**
 * Sort lines case-insensitively, in code point order
 *
 * The sort is stable in both directions: lines that compare equal once
 * lowercased keep their input order.
 *
 * @example
 * sortLines('banana\nApple\ncherry', true)  // 'Apple\nbanana\ncherry'
 * sortLines('banana\nApple\ncherry', false) // 'cherry\nbanana\nApple'
 */
export function sortLines(text: string, ascending: boolean): string {
  const direction = ascending ? 1 : -1;
  const keyed = text.split('\n').map((line) => ({ line, key: codePoints(line.toLowerCase()) }));

  keyed.sort((a, b) => compareCodePoints(a.key, b.key) * direction);

  return keyed.map(({ line }) => line).join('\n');
}
