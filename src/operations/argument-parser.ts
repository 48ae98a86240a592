/**
 * Argument parser for the run command
 * Supports multiple input methods: named flags, JSON string, and stdin,
 * plus --file to load the `text` argument from disk
 */

import { readFile } from 'node:fs/promises';
import { convertCase } from '../text/case-renderer.js';
import type { OperationArgs, OperationSchema } from './types.js';

export const DEFAULT_MAX_INPUT_BYTES = 10 * 1024 * 1024;

export interface ParsedArguments {
  args: OperationArgs;
  source: 'flags' | 'json' | 'stdin';
}

export interface ParserOptions {
  jsonString?: string;
  useStdin?: boolean;
  /** Defaults to process.stdin */
  stdin?: AsyncIterable<Uint8Array | string>;
  /** Read the `text` argument from this file */
  filePath?: string;
  commanderOpts: Record<string, unknown>;
  commanderArgs?: string[];
  inputSchema?: OperationSchema;
  maxInputBytes?: number;
}

/**
 * Read the input size cap from TEXTKIT_MAX_INPUT_BYTES
 */
export function getMaxInputBytes(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.TEXTKIT_MAX_INPUT_BYTES;
  if (!raw) return DEFAULT_MAX_INPUT_BYTES;

  const limit = Number.parseInt(raw, 10);
  if (Number.isNaN(limit) || limit <= 0) return DEFAULT_MAX_INPUT_BYTES;
  return limit;
}

/**
 * Parse arguments from various sources with type conversion
 */
export async function parseArguments(options: ParserOptions): Promise<ParsedArguments> {
  const limit = options.maxInputBytes ?? getMaxInputBytes();
  const parsed = await parseArgumentSource(options, limit);

  if (options.filePath) {
    parsed.args.text = await readTextFile(options.filePath, limit);
  }

  return parsed;
}

async function parseArgumentSource(
  options: ParserOptions,
  limit: number,
): Promise<ParsedArguments> {
  // Priority 1: stdin
  if (options.useStdin) {
    const stdinContent = await readStdin(options.stdin ?? process.stdin, limit);
    try {
      const args: unknown = JSON.parse(stdinContent);
      if (!isPlainObject(args)) {
        throw new Error('stdin must contain a JSON object');
      }
      return { args, source: 'stdin' };
    } catch (error) {
      throw new Error(
        `Failed to parse JSON from stdin: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  // Priority 2: JSON string
  if (options.jsonString) {
    try {
      const args: unknown = JSON.parse(options.jsonString);
      if (!isPlainObject(args)) {
        throw new Error('--json must contain a JSON object');
      }
      return { args, source: 'json' };
    } catch (error) {
      throw new Error(
        `Failed to parse --json argument: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  // Priority 3: Named flags (convert with type inference)
  // Merge opts and args - args contains unknown options like ['--text', 'value']
  const mergedOpts = {
    ...options.commanderOpts,
    ...parseArgsArray(options.commanderArgs || [], options.inputSchema),
  };
  const args = convertNamedFlags(mergedOpts, options.inputSchema);
  return { args, source: 'flags' };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read all content from stdin, failing once the byte limit is passed
 */
async function readStdin(
  input: AsyncIterable<Uint8Array | string>,
  limit: number,
): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of input) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk);
    size += buffer.byteLength;
    if (size > limit) {
      throw new Error(`stdin input exceeds ${limit} bytes (TEXTKIT_MAX_INPUT_BYTES)`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString('utf-8');
}

async function readTextFile(filePath: string, limit: number): Promise<string> {
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new Error(
      `Failed to read --file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (content.byteLength > limit) {
    throw new Error(`File '${filePath}' exceeds ${limit} bytes (TEXTKIT_MAX_INPUT_BYTES)`);
  }
  return content.toString('utf-8');
}

/**
 * Parse Commander.js args array into key-value pairs
 * Handles: ['--text', 'value', '--flag', '--key=value']
 * Returns: { text: 'value', flag: true, key: 'value' }
 *
 * Kebab-case keys are folded to camelCase: --case-sensitive -> caseSensitive.
 * A string-typed key always takes the next argument, so `--find -` works.
 */
function parseArgsArray(args: string[], schema?: OperationSchema): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Skip undefined or non-flag arguments (the operation name lands here too)
    if (!arg || !arg.startsWith('-')) {
      continue;
    }

    const cleanArg = arg.replace(/^-+/, '');

    // Handle --key=value format
    const equals = cleanArg.indexOf('=');
    if (equals !== -1) {
      const key = cleanArg.slice(0, equals);
      if (key) {
        result[toArgumentKey(key)] = cleanArg.slice(equals + 1);
      }
      continue;
    }

    // Check if next argument is the value (not another flag)
    const key = toArgumentKey(cleanArg);
    const nextArg = args[i + 1];
    const takesString = schema?.properties[key]?.type === 'string';
    if (nextArg !== undefined && (takesString || !nextArg.startsWith('-'))) {
      result[key] = nextArg;
      i++;
    } else {
      // Boolean flag without value
      result[key] = true;
    }
  }

  return result;
}

function toArgumentKey(flag: string): string {
  return flag.includes('-') ? convertCase(flag, 'camelCase') : flag;
}

/**
 * Convert named flags to typed object using JSON Schema hints
 */
function convertNamedFlags(opts: Record<string, unknown>, schema?: OperationSchema): OperationArgs {
  const result: OperationArgs = {};

  // Options that belong to the run command itself
  const knownOptions = new Set([
    'json',
    'stdin',
    'file',
    'validate',
    'outputFormat',
    'quiet',
    'verbose',
  ]);

  for (const [key, value] of Object.entries(opts)) {
    if (knownOptions.has(key)) {
      continue;
    }

    result[key] = convertValue(value, schema?.properties[key]?.type);
  }

  return result;
}

/**
 * Convert value based on JSON Schema type
 */
function convertValue(value: unknown, type?: string): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  if (type === 'boolean') {
    if (value === 'true') return true;
    if (value === 'false') return false;
  }

  // Let the validator report anything that does not fit
  return value;
}
