export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

/** A backing table is missing or unreadable. Never retried. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message, 500);
  }
}

/** A backing table was read but does not match its column contract. */
export class DataSchemaError extends AppError {
  constructor(
    table: string,
    message: string,
    details?: Array<{ field: string; message: string }>,
  ) {
    super('DATA_SCHEMA_ERROR', `${table}: ${message}`, 500, details);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof AppError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
