/**
 * JSON Schema validator for operation arguments
 * Uses Ajv for validation with helpful error messages
 */

import ajvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';

// ajv is CommonJS; under NodeNext the default import is module.exports
const Ajv = ajvModule.default;

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

let ajv: InstanceType<typeof Ajv> | undefined;
const compiled = new WeakMap<SchemaObject, ValidateFunction>();

function getAjv(): InstanceType<typeof Ajv> {
  if (!ajv) {
    // Strict mode off so descriptive keywords such as `default` pass through
    ajv = new Ajv({
      allErrors: true,
      strict: false,
    });
  }
  return ajv;
}

/**
 * Validate arguments against a JSON Schema
 *
 * Compiled validators are cached per schema object.
 */
export function validateArguments(
  args: Record<string, unknown>,
  schema: SchemaObject,
): ValidationResult {
  let validate = compiled.get(schema);
  if (!validate) {
    try {
      validate = getAjv().compile(schema);
    } catch (error) {
      return {
        valid: false,
        errors: [
          `Schema compilation failed: ${error instanceof Error ? error.message : String(error)}`,
        ],
      };
    }
    compiled.set(schema, validate);
  }

  if (validate(args)) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: formatValidationErrors(validate.errors || []),
  };
}

/**
 * Format Ajv validation errors into human-readable messages
 */
function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'required':
        return `Missing required property: '${error.params.missingProperty}'`;

      case 'type':
        return `Property '${path}' must be of type ${error.params.type}`;

      case 'enum':
        return `Property '${path}' must be one of: ${error.params.allowedValues.join(', ')}`;

      case 'minLength':
        return `Property '${path}' must be at least ${error.params.limit} characters`;

      case 'maxLength':
        return `Property '${path}' must be at most ${error.params.limit} characters`;

      case 'pattern':
        return `Property '${path}' must match pattern: ${error.params.pattern}`;

      case 'additionalProperties':
        return `Unknown property: '${error.params.additionalProperty}'`;

      default:
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
