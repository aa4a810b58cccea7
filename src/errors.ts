/**
 * Base class for errors the application knows how to present. The HTTP
 * status travels with the error so the server's error handler can render it
 * without inspecting the concrete type.
 */
export class OrderFlowError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = "OrderFlowError";
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when configuration cannot be found or parsed
 */
export class ConfigError extends OrderFlowError {
  constructor(message: string) {
    super(message, 500);
    this.name = "ConfigError";
  }
}

export class FormValidationError extends OrderFlowError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, 400);
    this.name = "FormValidationError";
    this.fields = fields;
  }
}

export class ImportError extends OrderFlowError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ImportError";
  }
}

export class ColumnMismatchError extends ImportError {
  readonly received: string[];

  constructor(received: string[]) {
    super("Column structure mismatch. Use the provided template.");
    this.name = "ColumnMismatchError";
    this.received = received;
  }
}

export class UnsupportedFormatError extends ImportError {
  constructor(filename: string) {
    super(`Unsupported file type for "${filename}". Upload a .csv or .xlsx file.`);
    this.name = "UnsupportedFormatError";
  }
}

export class OrderNotFoundError extends OrderFlowError {
  readonly id: number;

  constructor(id: number) {
    super(`Order ${id} does not exist`, 404);
    this.name = "OrderNotFoundError";
    this.id = id;
  }
}

/**
 * Raised when the backing CSV file exists but cannot be read or decoded.
 */
export class DataFileError extends OrderFlowError {
  constructor(message: string) {
    super(message, 500);
    this.name = "DataFileError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
