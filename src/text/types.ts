/**
 * Type definitions for the text transformation core.
 *
 * Everything produced here is an immutable value that lives only for the
 * duration of a single call.
 */

/**
 * Identifier styles understood by convertCase
 */
export type CaseStyle = 'camelCase' | 'PascalCase' | 'snake_case' | 'kebab-case' | 'CONSTANT_CASE';

/**
 * Uppercases the first code point of a word and leaves the rest untouched.
 * Swap one in to change the casing table used for title-folding.
 */
export type Capitalizer = (word: string) => string;

export interface RenderOptions {
  /** Title-folds each token; defaults to the English capitalizer */
  readonly capitalize?: Capitalizer;
}

/**
 * Counts for a block of text, computed over the trimmed input
 */
export interface TextStats {
  /** Whitespace-delimited words: "Hello world." -> 2 */
  readonly words: number;

  /** Code points in the trimmed text */
  readonly characters: number;

  /** Code points with ' ' and '\n' removed */
  readonly charactersNoSpaces: number;

  /** '\n'-delimited segments */
  readonly lines: number;

  /** Blank-line-delimited segments with visible content */
  readonly paragraphs: number;
}
