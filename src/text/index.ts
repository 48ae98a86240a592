/**
 * Text transformation core
 *
 * Pure functions only: nothing here keeps state between calls.
 *
 * @example
 * import { convertCase, tokenize } from './text/index.js';
 *
 * tokenize('myVarName123');                 // ['my', 'Var', 'Name123']
 * convertCase('myVarName123', 'kebab-case'); // 'my-var-name123'
 */

export { createCapitalizer, englishCapitalizer } from './capitalize.js';
export { CASE_STYLES, convertCase, isCaseStyle, renderTokens } from './case-renderer.js';
export { InternalDefectError } from './errors.js';
export { buildCaseInsensitiveMatcher, escapeRegExp, findReplace } from './find-replace.js';
export { wordCount } from './stats.js';
export { isHumpBoundary, isWordChar, splitWords, tokenize } from './tokenizer.js';
export {
  removeDuplicateLines,
  reverseText,
  sortLines,
  toLowerCase,
  toTitleCase,
  toUpperCase,
  trimText,
} from './transforms.js';
export type { CaseStyle, Capitalizer, RenderOptions, TextStats } from './types.js';
