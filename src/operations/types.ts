/**
 * Type definitions for the operation layer that sits in front of the
 * text core (registry, argument parsing, validation, output).
 */

import type { TextStats } from '../text/types.js';

/**
 * JSON Schema for a single argument
 */
export type ArgumentSchema = {
  type: 'string' | 'boolean';
  description: string;
  default?: string | boolean;
};

/**
 * JSON Schema describing an operation's argument object
 */
export type OperationSchema = {
  type: 'object';
  properties: Record<string, ArgumentSchema>;
  required: string[];
  additionalProperties: false;
};

export type OperationArgs = Record<string, unknown>;

export type OperationValue = string | TextStats | string[];

export interface OperationDefinition {
  /** CLI name, kebab-case: "convert-case" */
  readonly name: string;
  readonly description: string;
  readonly inputSchema: OperationSchema;
  run(args: OperationArgs): OperationValue;
}

export interface OperationResult {
  readonly operation: string;
  readonly value: OperationValue;
}
