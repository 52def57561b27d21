/**
 * Note file names
 *
 * Notes follow the `IDENTIFIER--title-slug__keyword1_keyword2.ext`
 * convention; an optional `==signature` may sit after the identifier.
 */

import { extname } from 'path';

export interface NoteFilename {
  identifier?: string;
  extension: string;
}

// Identifier, then any of ==signature, --title, __keywords
const FILENAME_PATTERN = /^(\d{8}T\d{6})(?:(?:==|--|__).*)?$/;

/**
 * Convert a title to a URL/filename-safe slug (lowercase with hyphens)
 */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .trim()
    .replace(/[/\\&+]/g, '-') // Replace separators with hyphens first
    .replace(/[^\w\s-]/g, '') // Remove non-word chars (except spaces and hyphens)
    .replace(/_/g, '-')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Split a note file name into identifier and extension
 */
export function parseNoteFilename(filename: string): NoteFilename {
  const extension = extname(filename).toLowerCase();
  const stem = filename.slice(0, filename.length - extension.length);
  const match = stem.match(FILENAME_PATTERN);

  if (!match || !match[1]) {
    return { extension };
  }
  return { identifier: match[1], extension };
}

/**
 * Identifier for a note file: the embedded identifier, or a slug of the
 * file name for notes outside the convention
 */
export function identifierFromFilename(filename: string): string {
  const parsed = parseNoteFilename(filename);
  if (parsed.identifier) {
    return parsed.identifier;
  }
  return slugify(filename.slice(0, filename.length - parsed.extension.length));
}

/**
 * File name of the published Markdown document
 */
export function publishedFilename(identifier: string): string {
  return `${identifier}.md`;
}
