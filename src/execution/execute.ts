import type { PromiseOrValue } from '../types/PromiseOrValue.js';

import type { ExecutionArgs } from './buildExecutionContext.js';
import { buildExecutionContext } from './buildExecutionContext.js';
import type { ExecutionResult } from './Executor.js';
import { Executor } from './Executor.js';

/**
 * Executes a query or mutation against a registry.
 *
 * The result is returned synchronously when no resolver returns a promise.
 * It is always well formed: `data` is `null` when execution could not start
 * or an error reached the operation root, and `errors` lists every error
 * raised, each positioned at the response path it occurred at.
 */
export function execute(args: ExecutionArgs): PromiseOrValue<ExecutionResult> {
  // If a valid execution context cannot be created due to incorrect arguments,
  // a "Response" with only errors is returned.
  const exeContext = buildExecutionContext(args);

  // Return early errors if execution context failed.
  if (!('registry' in exeContext)) {
    return { data: null, errors: exeContext };
  }

  return new Executor(exeContext).executeOperation();
}
