/**
 * Literal find/replace.
 *
 * `find` is never interpreted as a pattern and `replace` is inserted as-is,
 * so '$&' or '$1' in the replacement come out verbatim.
 */

import { debugError } from '../utils/debug.js';
import { InternalDefectError } from './errors.js';

const REGEXP_SYNTAX = /[.*+?^${}()|[\]\\]/g;

/**
 * Escape every RegExp syntax character in a literal
 *
 * @example
 * escapeRegExp('a.b*c') // 'a\\.b\\*c'
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(REGEXP_SYNTAX, '\\$&');
}

/**
 * Build a global, case-insensitive matcher for a literal string
 *
 * @throws InternalDefectError if the escaped literal fails to compile
 */
export function buildCaseInsensitiveMatcher(find: string): RegExp {
  try {
    return new RegExp(escapeRegExp(find), 'giu');
  } catch (error) {
    const defect = new InternalDefectError(`Escaped literal '${find}' did not compile`, {
      cause: error,
    });
    debugError('findReplace: matcher compilation failed', defect);
    throw defect;
  }
}

function insertBetweenCodePoints(text: string, insert: string): string {
  return ['', ...text, ''].join(insert);
}

/**
 * Replace every non-overlapping occurrence of `find`, scanning left to right
 *
 * An empty `find` matches before each code point and at the end of the text.
 *
 * @example
 * findReplace('Hello HELLO hello', 'hello', 'hi', false) // 'hi hi hi'
 * findReplace('Hello HELLO hello', 'hello', 'hi', true)  // 'Hello HELLO hi'
 * findReplace('aaa', 'aa', 'b', true)                    // 'ba'
 * findReplace('ab', '', '-', true)                       // '-a-b-'
 */
export function findReplace(
  text: string,
  find: string,
  replace: string,
  caseSensitive: boolean,
): string {
  if (find === '') {
    return insertBetweenCodePoints(text, replace);
  }

  if (caseSensitive) {
    return text.replaceAll(find, () => replace);
  }

  return text.replace(buildCaseInsensitiveMatcher(find), () => replace);
}
