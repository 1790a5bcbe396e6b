/**
 * Error hierarchy shared by the loaders, the reconciler and the CLI.
 *
 * Every failure is fatal for a run; the CLI maps `code` to an exit code.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base class for all domain errors
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Required input columns are missing.
 */
export class SchemaError extends DomainError {
  readonly code = 'SCHEMA_ERROR';

  constructor(
    message: string,
    public readonly missingColumns: readonly string[],
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A date, numeric or enum literal could not be parsed.
 */
export class ParseError extends DomainError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    public readonly literal: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A dataset or input file does not exist.
 */
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(
    message: string,
    public readonly resource: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}
