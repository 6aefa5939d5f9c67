/**
 * Error types shared by the preview engine and its collaborators.
 *
 * Two kinds reach callers of a preview: `ValidationError` for requests that
 * can be fixed by the caller, and `SourceUnavailableError` when row data for a
 * sheet cannot be loaded. Neither is retried.
 */

export type ErrorContext = Record<string, unknown>;

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;

  constructor(message: string, code = "APP_ERROR", statusCode = 500, context?: ErrorContext) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "VALIDATION_ERROR", 400, context);
  }
}

/** Row data for a sheet is missing or unreadable. */
export class SourceUnavailableError extends AppError {
  public readonly sheetId: string;

  constructor(sheetId: string, reason: string, context?: ErrorContext) {
    super(`Sheet '${sheetId}' is unavailable: ${reason}`, "SOURCE_UNAVAILABLE", 503, {
      sheetId,
      ...context,
    });
    this.sheetId = sheetId;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "CONFIGURATION_ERROR", 500, context);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function formatError(error: unknown): string {
  if (isAppError(error)) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
