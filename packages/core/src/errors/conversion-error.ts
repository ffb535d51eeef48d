/**
 * Error type raised by every converter
 * Messages name the field, the declared type and the offending value's type
 */

export type ConversionErrorCode =
  | 'UNSUPPORTED_TYPE'
  | 'UNSUPPORTED_CONVERSION'
  | 'NON_NULLABLE_NULL'
  | 'STRUCTURAL_MISMATCH'
  | 'PRECISION_LOSS'
  | 'UNKNOWN_LOGICAL_TYPE'
  | 'INVALID_VALUE'
  | 'SCHEMA_MISMATCH';

export interface ConversionErrorDetails {
  /** Error code for programmatic handling */
  code: ConversionErrorCode;
  /** Human-readable message */
  message: string;
  /** Name (or dotted path) of the field being converted */
  field?: string;
  /** Declared type of the field, as rendered by describeFieldType */
  fieldType?: string;
  /** Runtime type of the offending raw value */
  valueType?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly field?: string;
  readonly fieldType?: string;
  readonly valueType?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConversionErrorDetails) {
    super(details.message);
    this.name = 'ConversionError';
    this.code = details.code;
    this.field = details.field;
    this.fieldType = details.fieldType;
    this.valueType = details.valueType;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, ConversionError);
  }

  /**
   * An unknown logical type is a schema defect in the caller's code, not bad
   * input; retrying with other input cannot fix it.
   */
  get recoverable(): boolean {
    return this.code !== 'UNKNOWN_LOGICAL_TYPE';
  }

  /**
   * Re-raise with the enclosing field's name prepended to the path, keeping
   * code, types and suggestion.
   */
  withField(name: string): ConversionError {
    const field = this.field ? `${name}.${this.field}` : name;
    const prefix = this.field ? `Error converting field "${this.field}": ` : '';
    const detail = prefix && this.message.startsWith(prefix)
      ? this.message.slice(prefix.length)
      : this.message;
    return new ConversionError({
      code: this.code,
      message: `Error converting field "${field}": ${detail}`,
      field,
      fieldType: this.fieldType,
      valueType: this.valueType,
      suggestion: this.suggestion,
      cause: this,
      context: this.context,
    });
  }

  /**
   * Format error for logs
   * Returns a structured, actionable error message
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.field) {
      parts.push(`Field: ${this.field}`);
    }

    if (this.fieldType) {
      parts.push(`Declared type: ${this.fieldType}`);
    }

    if (this.valueType) {
      parts.push(`Value type: ${this.valueType}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured error responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      field: this.field,
      fieldType: this.fieldType,
      valueType: this.valueType,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Describe the runtime shape of a raw value for error messages
 */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

/**
 * Helper to wrap unknown errors as ConversionError
 */
export function wrapError(
  error: unknown,
  defaultCode: ConversionErrorCode = 'UNSUPPORTED_CONVERSION'
): ConversionError {
  if (error instanceof ConversionError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ConversionError({
    code: defaultCode,
    message,
    cause,
  });
}
