/**
 * Registry of named operations.
 *
 * Each entry pairs a text core function with the JSON Schema of the
 * arguments it takes, so callers can validate input before running it.
 */

import { CASE_STYLES, convertCase } from '../text/case-renderer.js';
import { findReplace } from '../text/find-replace.js';
import { wordCount } from '../text/stats.js';
import { tokenize } from '../text/tokenizer.js';
import {
  removeDuplicateLines,
  reverseText,
  sortLines,
  toLowerCase,
  toTitleCase,
  toUpperCase,
  trimText,
} from '../text/transforms.js';
import type {
  ArgumentSchema,
  OperationArgs,
  OperationDefinition,
  OperationResult,
  OperationSchema,
  OperationValue,
} from './types.js';

const TEXT_ARGUMENT: ArgumentSchema = { type: 'string', description: 'Input text' };

function schema(properties: Record<string, ArgumentSchema>, required: string[]): OperationSchema {
  return {
    type: 'object',
    properties: { text: TEXT_ARGUMENT, ...properties },
    required: ['text', ...required],
    additionalProperties: false,
  };
}

function stringArg(args: OperationArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new Error(`Argument '${key}' must be a string`);
  }
  return value;
}

function booleanArg(args: OperationArgs, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`Argument '${key}' must be a boolean`);
  }
  return value;
}

/**
 * Operation taking only `text`
 */
function textOperation(
  name: string,
  description: string,
  transform: (text: string) => OperationValue,
): OperationDefinition {
  return {
    name,
    description,
    inputSchema: schema({}, []),
    run: (args) => transform(stringArg(args, 'text')),
  };
}

const OPERATIONS: readonly OperationDefinition[] = [
  textOperation('uppercase', 'Convert text to upper case', toUpperCase),
  textOperation('lowercase', 'Convert text to lower case', toLowerCase),
  textOperation('title-case', 'Capitalize the first letter of every word', (text) =>
    toTitleCase(text),
  ),
  textOperation('reverse', 'Reverse text by code point', reverseText),
  textOperation('trim', 'Remove leading and trailing whitespace', trimText),
  textOperation(
    'word-count',
    'Count words, characters, lines and paragraphs of the trimmed text',
    wordCount,
  ),
  textOperation(
    'dedupe-lines',
    'Remove duplicate lines, keeping the first occurrence',
    removeDuplicateLines,
  ),
  textOperation('tokenize', 'Split text into words, breaking camelCase humps', tokenize),
  {
    name: 'convert-case',
    description: 'Convert text to an identifier style',
    inputSchema: schema(
      {
        style: {
          type: 'string',
          description: `Target style: ${CASE_STYLES.join(' | ')} (anything else returns the text unchanged)`,
        },
      },
      ['style'],
    ),
    run: (args) => convertCase(stringArg(args, 'text'), stringArg(args, 'style')),
  },
  {
    name: 'find-replace',
    description: 'Replace every occurrence of a literal string',
    inputSchema: schema(
      {
        find: { type: 'string', description: 'Literal text to find' },
        replace: { type: 'string', description: 'Replacement, inserted as-is' },
        caseSensitive: { type: 'boolean', description: 'Match case exactly', default: true },
      },
      ['find', 'replace'],
    ),
    run: (args) =>
      findReplace(
        stringArg(args, 'text'),
        stringArg(args, 'find'),
        stringArg(args, 'replace'),
        booleanArg(args, 'caseSensitive', true),
      ),
  },
  {
    name: 'sort-lines',
    description: 'Sort lines case-insensitively (stable)',
    inputSchema: schema(
      {
        ascending: { type: 'boolean', description: 'Sort A to Z', default: true },
      },
      [],
    ),
    run: (args) => sortLines(stringArg(args, 'text'), booleanArg(args, 'ascending', true)),
  },
];

const OPERATIONS_BY_NAME = new Map(OPERATIONS.map((op) => [op.name, op]));

/**
 * All operations, sorted by name
 */
export function listOperations(): OperationDefinition[] {
  return [...OPERATIONS].sort((a, b) => (a.name < b.name ? -1 : 1));
}

export function getOperation(name: string): OperationDefinition | undefined {
  return OPERATIONS_BY_NAME.get(name);
}

/**
 * Run an operation by name
 *
 * @throws Error if the operation does not exist or an argument has the wrong type
 *
 * @example
 * runOperation('convert-case', { text: 'my var', style: 'PascalCase' })
 * // { operation: 'convert-case', value: 'MyVar' }
 */
export function runOperation(name: string, args: OperationArgs): OperationResult {
  const operation = getOperation(name);
  if (!operation) {
    throw new Error(`Operation '${name}' not found`);
  }

  return Object.freeze({
    operation: operation.name,
    value: operation.run(args),
  });
}
