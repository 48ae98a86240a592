/**
 * Output formatter for operation results
 * Supports multiple output formats: text, json, raw
 */

import type { TextStats } from '../text/types.js';
import type { OperationResult, OperationValue } from './types.js';

export type OutputFormat = 'text' | 'json' | 'raw';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'raw'];

export interface FormattedOutput {
  content: string;
  exitCode: number;
}

const STATS_FIELDS: readonly (keyof TextStats)[] = [
  'words',
  'characters',
  'charactersNoSpaces',
  'lines',
  'paragraphs',
];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Format operation result based on output format
 */
export function formatOutput(result: OperationResult, format: OutputFormat): FormattedOutput {
  switch (format) {
    case 'text':
      return { content: formatAsText(result.value), exitCode: 0 };
    case 'json':
      return {
        content: JSON.stringify(
          { success: true, operation: result.operation, result: result.value },
          null,
          2,
        ),
        exitCode: 0,
      };
    case 'raw':
      return { content: JSON.stringify(result.value, null, 2), exitCode: 0 };
  }
}

/**
 * Format as plain text (default)
 * Strings print as-is, token lists one per line, stats as `field: count` lines
 */
function formatAsText(value: OperationValue): string {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.join('\n');
  }

  return STATS_FIELDS.map((field) => `${field}: ${value[field]}`).join('\n');
}

/**
 * Format a failed operation
 */
export function formatFailure(
  operation: string,
  error: unknown,
  format: OutputFormat,
  exitCode = 1,
): FormattedOutput {
  const message = error instanceof Error ? error.message : String(error);

  if (format === 'text') {
    return { content: `Error: ${message}`, exitCode };
  }

  return {
    content: JSON.stringify({ success: false, operation, error: message }, null, 2),
    exitCode,
  };
}
