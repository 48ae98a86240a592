/**
 * textkit public API
 *
 * @example
 * import { convertCase, runOperation } from 'textkit';
 *
 * convertCase('myVarName123', 'snake_case'); // 'my_var_name123'
 * runOperation('reverse', { text: 'abc' });   // { operation: 'reverse', value: 'cba' }
 */

export * from './operations/index.js';
export * from './text/index.js';
