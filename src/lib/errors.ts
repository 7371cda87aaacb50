/**
 * Error classes for the record store, BOM reader and document generator.
 * The CLI maps `exitCode` to the process exit status.
 */

export interface CustomError extends Error {
  readonly exitCode: number;
}

/**
 * Invalid user input: extensions, VAT numbers, deadlines, unknown BOM formats.
 *
 * @example
 * throw new ValidationError('Invalid VAT number', { vat: 'XX' });
 */
export class ValidationError extends Error implements CustomError {
  readonly name = "ValidationError" as const;
  readonly exitCode = 2 as const;
  readonly details: unknown;

  constructor(message: string, details: unknown = null) {
    super(message);
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends Error implements CustomError {
  readonly name = "NotFoundError" as const;
  readonly exitCode = 2 as const;
  readonly resourceType: string | null;
  readonly resourceId: string | null;

  constructor(message: string, resourceType: string | null = null, resourceId: string | null = null) {
    super(message);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Thrown by `PartyStore.add` when a record with the same name exists.
 */
export class DuplicateKeyError extends Error implements CustomError {
  readonly name = "DuplicateKeyError" as const;
  readonly exitCode = 2 as const;
  readonly key: string;

  constructor(key: string, collection: string) {
    super(`${collection} '${key}' already exists`);
    this.key = key;
    Object.setPrototypeOf(this, DuplicateKeyError.prototype);
  }
}

export class MissingColumnError extends Error implements CustomError {
  readonly name = "MissingColumnError" as const;
  readonly exitCode = 2 as const;
  readonly column: string;
  readonly source: string | null;

  constructor(column: string, source: string | null = null) {
    super(source ? `Missing column '${column}' in ${source}` : `Missing column '${column}'`);
    this.column = column;
    this.source = source;
    Object.setPrototypeOf(this, MissingColumnError.prototype);
  }
}

/**
 * A BOM row that could not be turned into a line item.
 * `row` is the 1-based data row (the header is not counted).
 */
export class BomParseError extends Error implements CustomError {
  readonly name = "BomParseError" as const;
  readonly exitCode = 2 as const;
  readonly row: number;
  readonly field: string;
  readonly value: string;

  constructor(row: number, field: string, value: string, reason: string) {
    super(`BOM row ${row}: ${field} ${reason} (got '${value}')`);
    this.row = row;
    this.field = field;
    this.value = value;
    Object.setPrototypeOf(this, BomParseError.prototype);
  }
}

export class CsvImportError extends Error implements CustomError {
  readonly name = "CsvImportError" as const;
  readonly exitCode = 2 as const;
  readonly row: number;
  readonly applied: number;

  constructor(row: number, applied: number, reason: string) {
    super(`CSV row ${row}: ${reason} (${applied} row(s) applied before it)`);
    this.row = row;
    this.applied = applied;
    Object.setPrototypeOf(this, CsvImportError.prototype);
  }
}

export class RenderError extends Error implements CustomError {
  readonly name = "RenderError" as const;
  readonly exitCode = 1 as const;
  readonly documentType: string;

  constructor(message: string, documentType: string) {
    super(message);
    this.documentType = documentType;
    Object.setPrototypeOf(this, RenderError.prototype);
  }
}

export class StoreLoadError extends Error implements CustomError {
  readonly name = "StoreLoadError" as const;
  readonly exitCode = 1 as const;
  readonly path: string;
  readonly originalError: Error | null;

  constructor(path: string, originalError: Error | null = null) {
    super(`Could not load ${path}${originalError ? `: ${originalError.message}` : ""}`);
    this.path = path;
    this.originalError = originalError;
    Object.setPrototypeOf(this, StoreLoadError.prototype);
  }
}

export function isCustomError(error: unknown): error is CustomError {
  return error instanceof Error && "exitCode" in error && typeof error.exitCode === "number";
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
