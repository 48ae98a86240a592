import type { Capitalizer } from './types.js';

/**
 * Letters whose titlecase form differs from their uppercase form.
 * ß has no single-letter titlecase, so it stays as it is.
 */
const TITLECASE: ReadonlyMap<string, string> = new Map([
  ['Ǆ', 'ǅ'],
  ['ǅ', 'ǅ'],
  ['ǆ', 'ǅ'],
  ['Ǉ', 'ǈ'],
  ['ǈ', 'ǈ'],
  ['ǉ', 'ǈ'],
  ['Ǌ', 'ǋ'],
  ['ǋ', 'ǋ'],
  ['ǌ', 'ǋ'],
  ['Ǳ', 'ǲ'],
  ['ǲ', 'ǲ'],
  ['ǳ', 'ǲ'],
  ['ß', 'ß'],
]);

/**
 * Build a capitalizer that title-folds the first code point, falling back
 * to the locale's uppercase mapping.
 *
 * @example
 * createCapitalizer('tr')('istanbul') // 'İstanbul'
 * createCapitalizer('en')('istanbul') // 'Istanbul'
 * createCapitalizer('en')('ǆungla')   // 'ǅungla'
 */
export function createCapitalizer(locale: string): Capitalizer {
  return (word) => {
    const [first, ...rest] = word;
    if (first === undefined) return word;
    return (TITLECASE.get(first) ?? first.toLocaleUpperCase(locale)) + rest.join('');
  };
}

/**
 * Default capitalizer used by toTitleCase and the case renderer
 */
export const englishCapitalizer: Capitalizer = createCapitalizer('en');
