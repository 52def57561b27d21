/**
 * Error types raised while publishing notes
 *
 * Each error carries a machine-readable code that tool handlers copy into
 * their ToolError result.
 */

export type PublishErrorCode =
  | 'INVALID_LIST_ELEMENT'
  | 'MALFORMED_SCALAR'
  | 'UNRESOLVED_REFERENCE'
  | 'NOTE_NOT_FOUND'
  | 'DUPLICATE_IDENTIFIER'
  | 'CONFIG_ERROR';

export class PublishError extends Error {
  readonly code: PublishErrorCode;

  constructor(message: string, code: PublishErrorCode) {
    super(message);
    this.name = 'PublishError';
    this.code = code;
  }
}

/**
 * A sequence field holds something other than a number, atom or
 * non-empty string. Aborts front-matter synthesis for the note.
 */
export class InvalidListElementError extends PublishError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`Invalid element in list field "${field}": ${describeValue(value)}`, 'INVALID_LIST_ELEMENT');
    this.name = 'InvalidListElementError';
    this.field = field;
    this.value = value;
  }
}

/**
 * A scalar value that is not absent, a number, an atom or a string
 */
export class MalformedScalarError extends PublishError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Cannot render value as a YAML scalar: ${describeValue(value)}`, 'MALFORMED_SCALAR');
    this.name = 'MalformedScalarError';
    this.value = value;
  }
}

export class UnresolvedReferenceError extends PublishError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`No note with identifier ${identifier}`, 'UNRESOLVED_REFERENCE');
    this.name = 'UnresolvedReferenceError';
    this.identifier = identifier;
  }
}

export class NoteNotFoundError extends PublishError {
  readonly path: string;

  constructor(path: string) {
    super(`Note not found: ${path}`, 'NOTE_NOT_FOUND');
    this.name = 'NoteNotFoundError';
    this.path = path;
  }
}

/**
 * A second note claims an identifier already taken by another note
 */
export class DuplicateIdentifierError extends PublishError {
  readonly identifier: string;
  readonly existingPath: string;

  constructor(identifier: string, existingPath: string) {
    super(`Duplicate note identifier ${identifier} (already used by ${existingPath})`, 'DUPLICATE_IDENTIFIER');
    this.name = 'DuplicateIdentifierError';
    this.identifier = identifier;
    this.existingPath = existingPath;
  }
}

export class ConfigError extends PublishError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Short, printable description of an arbitrary value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Date(invalid)' : `Date(${value.toISOString()})`;
  }
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}

/**
 * Error message and code for a ToolError
 */
export function toErrorInfo(error: unknown, fallbackCode: string): { error: string; code: string } {
  if (error instanceof PublishError) {
    return { error: error.message, code: error.code };
  }
  return {
    error: error instanceof Error ? error.message : String(error),
    code: fallbackCode,
  };
}
