/**
 * Word segmentation for free text and programming identifiers.
 *
 * A token is a maximal run of letters and numbers. Everything else is a
 * separator and is dropped. Inside a run, a lowercase letter followed by an
 * uppercase letter starts a new token, which is what splits camelCase humps.
 */

const WORD_CHAR = /^[\p{L}\p{N}]$/u;
const UPPERCASE = /^\p{Lu}$/u;
const LOWERCASE = /^\p{Ll}$/u;

/**
 * Check if a single code point is a letter or number
 */
export function isWordChar(char: string): boolean {
  return WORD_CHAR.test(char);
}

/**
 * Check for a lowercase -> uppercase transition between two code points
 */
export function isHumpBoundary(previous: string | undefined, current: string): boolean {
  if (previous === undefined) return false;
  return UPPERCASE.test(current) && LOWERCASE.test(previous);
}

/**
 * Split text into tokens, in scan order
 *
 * The hump check looks at the previous input code point, not at the
 * accumulated token, so it behaves the same for ASCII and non-ASCII letters.
 *
 * @example
 * tokenize('myVarName123')    // ['my', 'Var', 'Name123']
 * tokenize('hello-world_foo') // ['hello', 'world', 'foo']
 * tokenize('straßeÜber')      // ['straße', 'Über']
 * tokenize('XMLParser')       // ['XMLParser'] (acronyms stay together)
 * tokenize('!!! ---')         // []
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let previous: string | undefined;

  // for..of walks code points, so surrogate pairs arrive whole
  for (const char of text) {
    if (isWordChar(char)) {
      if (current.length > 0 && isHumpBoundary(previous, char)) {
        tokens.push(current);
        current = '';
      }
      current += char;
    } else if (current.length > 0) {
      tokens.push(current);
      current = '';
    }
    previous = char;
  }

  if (current.length > 0) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Alias of tokenize, kept for callers that think in words
 */
export const splitWords = tokenize;
