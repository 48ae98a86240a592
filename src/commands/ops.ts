import type { Command } from 'commander';
import { getOperation, listOperations } from '../operations/registry.js';
import type { OperationDefinition } from '../operations/types.js';
import { output } from '../utils/output.js';

/**
 * One line per argument: "  text (string, required) - Input text"
 */
export function describeArguments(operation: OperationDefinition): string[] {
  const { properties, required } = operation.inputSchema;

  return Object.entries(properties).map(([name, prop]) => {
    const flags: string[] = [prop.type];
    if (required.includes(name)) flags.push('required');
    if (prop.default !== undefined) flags.push(`default: ${String(prop.default)}`);
    return `  ${name} (${flags.join(', ')}) - ${prop.description}`;
  });
}

export function opsCommand(program: Command): void {
  const ops = program.command('ops');
  ops.description('Explore available text operations');

  // ops list
  ops
    .command('list')
    .description('List all operations')
    .action(() => {
      const operations = listOperations();
      const width = Math.max(...operations.map((op) => op.name.length));

      output.info(`Available operations (${operations.length}):`);
      for (const op of operations) {
        output.result(`  ${op.name.padEnd(width)}  ${op.description}`);
      }
    });

  // ops describe <name>
  ops
    .command('describe <operation>')
    .description('Show an operation and its arguments')
    .action((operationName: string) => {
      const operation = getOperation(operationName);

      if (!operation) {
        output.error(`Error: Operation '${operationName}' not found`);
        output.error('Hint: Use "textkit ops list" to see available operations');
        process.exit(1);
      }

      output.result(`Operation: ${operation.name}`);
      output.result(`  ${operation.description}`);
      output.result('');
      output.result('Arguments:');
      for (const line of describeArguments(operation)) {
        output.result(line);
      }
      output.result('');
      output.result('Schema:');
      output.result(JSON.stringify(operation.inputSchema, null, 2));
    });
}
