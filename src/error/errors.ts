import type { GraphQLErrorOptions } from 'graphql';
import { GraphQLError } from 'graphql';

/**
 * Raised when type definitions cannot form a registry. Every problem found
 * during the build is listed in `problems`; no query may execute against the
 * definitions.
 */
export class SchemaBuildError extends Error {
  readonly problems: ReadonlyArray<string>;

  constructor(problems: ReadonlyArray<string>) {
    super(problems.join('\n\n'));
    this.name = 'SchemaBuildError';
    this.problems = problems;
  }
}

/**
 * A raw argument, variable or input-object value does not fit its declared
 * type. `inputPath` locates the offending element within the value.
 */
export class CoercionError extends GraphQLError {
  readonly inputPath: ReadonlyArray<string | number>;

  constructor(
    message: string,
    inputPath: ReadonlyArray<string | number> = [],
    options?: GraphQLErrorOptions,
  ) {
    super(message, options);
    this.name = 'CoercionError';
    this.inputPath = inputPath;
  }
}

export class MissingVariableError extends CoercionError {
  readonly variableName: string;

  constructor(
    message: string,
    variableName: string,
    options?: GraphQLErrorOptions,
  ) {
    super(message, [], options);
    this.name = 'MissingVariableError';
    this.variableName = variableName;
  }
}

/**
 * Several arguments of one field or directive could not be coerced. It reads
 * as the first of them; `errors` holds every one in argument order.
 */
export class ArgumentCoercionErrors extends CoercionError {
  readonly errors: readonly [CoercionError, ...Array<CoercionError>];

  constructor(errors: readonly [CoercionError, ...Array<CoercionError>]) {
    const [first] = errors;
    super(first.message, first.inputPath, {
      nodes: first.nodes,
      path: first.path,
      originalError: first.originalError,
    });
    this.name = 'ArgumentCoercionErrors';
    this.errors = errors;
  }
}

/**
 * A resolver threw, rejected or returned an error. The value it produced is
 * kept as `originalError`.
 */
export class ResolverError extends GraphQLError {
  constructor(originalError: Error, options?: GraphQLErrorOptions) {
    super(originalError.message, { ...options, originalError });
    this.name = 'ResolverError';
  }
}

/**
 * No single concrete object type could be determined for a value of an
 * interface or union type.
 */
export class AbstractResolutionError extends GraphQLError {
  constructor(message: string, options?: GraphQLErrorOptions) {
    super(message, options);
    this.name = 'AbstractResolutionError';
  }
}

export class FieldNotFoundError extends GraphQLError {
  constructor(message: string, options?: GraphQLErrorOptions) {
    super(message, options);
    this.name = 'FieldNotFoundError';
  }
}

export class ExecutionAbortedError extends GraphQLError {
  constructor(reason: unknown, options?: GraphQLErrorOptions) {
    super(
      reason instanceof Error
        ? `Execution aborted: ${reason.message}`
        : 'Execution aborted.',
      options,
    );
    this.name = 'ExecutionAbortedError';
  }
}
