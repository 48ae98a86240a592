export { getMaxInputBytes, parseArguments } from './argument-parser.js';
export type { ParsedArguments, ParserOptions } from './argument-parser.js';
export { formatFailure, formatOutput, isOutputFormat, OUTPUT_FORMATS } from './output-formatter.js';
export type { FormattedOutput, OutputFormat } from './output-formatter.js';
export { getOperation, listOperations, runOperation } from './registry.js';
export { validateArguments } from './schema-validator.js';
export type { ValidationResult } from './schema-validator.js';
export type {
  ArgumentSchema,
  OperationArgs,
  OperationDefinition,
  OperationResult,
  OperationSchema,
  OperationValue,
} from './types.js';
