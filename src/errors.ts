import type { SchemaViolation } from '~/types';

/**
 * Base class of every failure raised by a keyword. Host runners report
 * the message as the reason the step failed.
 */
export class JsonValidatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JsonValidatorError';
  }
}

export class ParseError extends JsonValidatorError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Could not parse '${source}' as JSON: ${reason}`);
    this.name = 'ParseError';
    this.source = source;
  }
}

/**
 * The schema itself is unusable: not JSON, not an object or boolean, or
 * rejected by the validator when compiled.
 */
export class SchemaError extends JsonValidatorError {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class SchemaValidationError extends JsonValidatorError {
  readonly errors: SchemaViolation[];

  constructor(errors: SchemaViolation[]) {
    const lines = errors.map(e => `${e.instancePath || '/'}: ${e.message} [${e.keyword}]`);
    super(['Failed validating json by schema', ...lines].join('\n'));
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

export class AssertionError extends JsonValidatorError {
  readonly expression: string;

  constructor(message: string, expression: string) {
    super(message);
    this.name = 'AssertionError';
    this.expression = expression;
  }
}
