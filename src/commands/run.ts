/**
 * Command to run a text operation from the CLI
 */

import { Command } from 'commander';
import { parseArguments } from '../operations/argument-parser.js';
import {
  type FormattedOutput,
  formatFailure,
  formatOutput,
  isOutputFormat,
  OUTPUT_FORMATS,
} from '../operations/output-formatter.js';
import { getOperation, runOperation } from '../operations/registry.js';
import { validateArguments } from '../operations/schema-validator.js';
import { isCaseStyle } from '../text/case-renderer.js';
import { InternalDefectError } from '../text/errors.js';
import { debugFormat, debugLog, debugVerbose, setDebugLevel } from '../utils/debug.js';
import { output } from '../utils/output.js';

/** EX_SOFTWARE from sysexits.h */
export const INTERNAL_DEFECT_EXIT_CODE = 70;

export interface RunOptions {
  json?: string;
  stdin?: boolean;
  file?: string;
  validate: boolean;
  outputFormat: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface RunInput {
  commanderOpts: Record<string, unknown>;
  commanderArgs: string[];
  stdin?: AsyncIterable<Uint8Array | string>;
}

/**
 * Create the 'run' command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Run a text operation')
    .argument('<operation>', 'Operation name, e.g. convert-case or word-count')
    .option('--json <string>', 'Arguments as JSON string')
    .option('--stdin', 'Read arguments from stdin as JSON')
    .option('-f, --file <path>', 'Read the text argument from a file')
    .option('--no-validate', 'Skip schema validation')
    .option('--output-format <format>', `Output format: ${OUTPUT_FORMATS.join('|')}`, 'text')
    .option('-q, --quiet', 'Suppress non-error output')
    .option('-v, --verbose', 'Verbose output')
    .allowUnknownOption() // Allow named flags for arguments
    .action(async (operationName: string, options: RunOptions, command: Command) => {
      if (options.verbose) {
        output.setLevel('verbose');
        setDebugLevel(2);
      } else if (options.quiet) {
        output.setLevel('quiet');
      }

      const format = isOutputFormat(options.outputFormat) ? options.outputFormat : 'text';

      try {
        const formatted = await executeRun(operationName, options, {
          commanderOpts: command.opts(),
          commanderArgs: command.args,
        });
        output.result(formatted.content);
      } catch (err) {
        const exitCode = err instanceof InternalDefectError ? INTERNAL_DEFECT_EXIT_CODE : 1;
        const failure = formatFailure(operationName, err, format, exitCode);
        output.error(failure.content);
        process.exit(failure.exitCode);
      }
    });
}

/**
 * Parse, validate and run one operation, returning the formatted result
 *
 * @throws Error for unknown operations, unreadable input or invalid arguments
 */
export async function executeRun(
  operationName: string,
  options: RunOptions,
  input: RunInput,
): Promise<FormattedOutput> {
  debugVerbose(`Running operation: ${operationName}`);
  debugVerbose(`Options: ${debugFormat(options)}`);

  const format = options.outputFormat;
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output format '${format}'. Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  // 1. Find the operation
  const operation = getOperation(operationName);
  if (!operation) {
    throw new Error(
      `Operation '${operationName}' not found. Run "textkit ops list" to see available operations.`,
    );
  }

  // 2. Parse arguments
  debugLog('Parsing arguments');
  const { args, source } = await parseArguments({
    jsonString: options.json,
    useStdin: options.stdin,
    stdin: input.stdin,
    filePath: options.file,
    commanderOpts: input.commanderOpts,
    commanderArgs: input.commanderArgs,
    inputSchema: operation.inputSchema,
  });

  output.debug(`Arguments read from ${source}`);
  debugVerbose(`Parsed arguments: ${debugFormat(args)}`);

  // 3. Validate arguments (if not disabled)
  if (!options.validate) {
    output.warn('Warning: Schema validation skipped (--no-validate)');
  } else {
    debugLog('Validating arguments against schema');
    const validation = validateArguments(args, operation.inputSchema);

    if (!validation.valid) {
      throw new Error(
        `Invalid arguments for operation '${operationName}':\n${validation.errors?.map((e) => `  - ${e}`).join('\n')}`,
      );
    }
  }

  if (operation.name === 'convert-case' && typeof args.style === 'string' && !isCaseStyle(args.style)) {
    output.warn(`Warning: Unknown style '${args.style}', text returned unchanged`);
  }

  // 4. Execute and format
  debugLog(`Executing operation: ${operation.name}`);
  const result = runOperation(operation.name, args);
  debugVerbose(`Raw result: ${debugFormat(result.value)}`);

  return formatOutput(result, format);
}
