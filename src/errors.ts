/**
 * Custom Error Types
 * Structured errors raised while loading, configuring or filtering a report
 */

/**
 * Base error class for all report filter errors
 */
export class ReportFilterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'ReportFilterError';
    this.code = code;
    this.context = options?.context;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Header or column count does not match the report schema
 */
export class ReportSchemaError extends ReportFilterError {
  public readonly lineNumber?: number;

  constructor(message: string, options?: { lineNumber?: number; context?: Record<string, unknown> }) {
    super(message, 'SCHEMA_ERROR', { context: options?.context });
    this.name = 'ReportSchemaError';
    this.lineNumber = options?.lineNumber;
  }
}

/**
 * A numeric (or flag) column holds something that is neither a number nor the sentinel
 */
export class ReportCoercionError extends ReportFilterError {
  public readonly column: string;
  public readonly value: string;
  public readonly expected: 'integer' | 'float';
  public readonly lineNumber?: number;

  constructor(column: string, value: string, expected: 'integer' | 'float', lineNumber?: number) {
    const where = lineNumber !== undefined ? ` at line ${lineNumber}` : '';
    super(
      `Column "${column}" expects ${expected === 'integer' ? 'an integer' : 'a float'} or "." but got "${value}"${where}`,
      'COERCION_ERROR',
      { context: { column, value, expected, lineNumber } }
    );
    this.name = 'ReportCoercionError';
    this.column = column;
    this.value = value;
    this.expected = expected;
    this.lineNumber = lineNumber;
  }

  atLine(lineNumber: number): ReportCoercionError {
    return new ReportCoercionError(this.column, this.value, this.expected, lineNumber);
  }
}

/**
 * Invalid options, environment values or flag names
 */
export class ConfigError extends ReportFilterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { context });
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if error is a report filter error
 */
export function isReportFilterError(error: unknown): error is ReportFilterError {
  return error instanceof ReportFilterError;
}
