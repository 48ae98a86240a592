/**
 * Renders a token sequence into an identifier style.
 */

import { englishCapitalizer } from './capitalize.js';
import { tokenize } from './tokenizer.js';
import type { CaseStyle, RenderOptions } from './types.js';

/**
 * All supported styles, in the order they are documented
 */
export const CASE_STYLES: readonly CaseStyle[] = Object.freeze([
  'camelCase',
  'PascalCase',
  'snake_case',
  'kebab-case',
  'CONSTANT_CASE',
]);

/**
 * Check if a string names a supported style
 *
 * @example
 * isCaseStyle('snake_case') // true
 * isCaseStyle('snake')      // false
 */
export function isCaseStyle(value: string): value is CaseStyle {
  return CASE_STYLES.some((style) => style === value);
}

/**
 * Join tokens in the given style
 *
 * An empty token list renders to '' for every style.
 *
 * @example
 * renderTokens(['my', 'Var', 'Name123'], 'snake_case')    // 'my_var_name123'
 * renderTokens(['my', 'var', 'name123'], 'camelCase')     // 'myVarName123'
 * renderTokens(['http', 'Request'], 'CONSTANT_CASE')      // 'HTTP_REQUEST'
 */
export function renderTokens(
  tokens: readonly string[],
  style: CaseStyle,
  options: RenderOptions = {},
): string {
  const capitalize = options.capitalize ?? englishCapitalizer;
  const titled = (token: string) => capitalize(token.toLowerCase());

  switch (style) {
    case 'camelCase':
      return tokens.map((token, i) => (i === 0 ? token.toLowerCase() : titled(token))).join('');
    case 'PascalCase':
      return tokens.map(titled).join('');
    case 'snake_case':
      return tokens.map((token) => token.toLowerCase()).join('_');
    case 'kebab-case':
      return tokens.map((token) => token.toLowerCase()).join('-');
    case 'CONSTANT_CASE':
      return tokens.map((token) => token.toUpperCase()).join('_');
  }
}

/**
 * Convert text to an identifier style
 *
 * Unknown styles are not an error: the text comes back unchanged.
 *
 * @example
 * convertCase('myVarName123', 'snake_case')   // 'my_var_name123'
 * convertCase('hello world', 'PascalCase')    // 'HelloWorld'
 * convertCase('abc', 'unknown-style')         // 'abc'
 */
export function convertCase(text: string, style: string, options: RenderOptions = {}): string {
  if (!isCaseStyle(style)) return text;
  return renderTokens(tokenize(text), style, options);
}
