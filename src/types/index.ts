/**
 * Core type definitions for Note Publisher
 */

// A configured front-matter entry name (title, tags, ...)
export type FieldDescriptor = string;

// Symbolic atom, rendered as a double-quoted name
export interface Atom {
  readonly kind: 'atom';
  readonly name: string;
}

/**
 * Metadata environment produced by the host for one note.
 *
 * The well-known slots back the dedicated field kinds; everything else is
 * looked up in the open-ended option table. Option values stay `unknown`
 * because they come straight from a parsed document header.
 */
export interface MetadataEnvironment {
  title?: string;
  created?: Date;
  aliases?: string;
  // Tags as declared; elements are validated when serialized
  tags: readonly unknown[];
  category?: string;
  options: ReadonlyMap<string, unknown>;
}

// Source format of a note
export type NoteFormat = 'org' | 'markdown';

// A parsed note as handed over by the reader
export interface Note {
  path: string;
  identifier: string;
  format: NoteFormat;
  environment: MetadataEnvironment;
  body: string;
}

// A link as the body converter sees it: [[type:path][label]]
export interface LinkDescription {
  type: string;
  path: string;
}

// Internal reference after resolution
export interface ResolvedReference {
  identifier: string;
  query?: string;
}

// Log levels
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Process-wide publishing configuration.
 * Built once at startup and frozen; passed into every operation.
 */
export interface PublishConfig {
  readonly notesDir: string;
  readonly baseDir: string;
  readonly publishDir: string;
  readonly linkClass: string;
  readonly frontMatterFields: readonly FieldDescriptor[];
  readonly logLevel: LogLevel;
  readonly watchEnabled: boolean;
}

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;
