/**
 * Note file reading operations
 *
 * Turns a note file into a Note: identifier, metadata environment and
 * raw body. Org notes use their keyword block, Markdown notes their YAML
 * front matter.
 */

import { readFile, readdir } from 'fs/promises';
import { join, extname, basename, isAbsolute } from 'path';
import { parseFrontmatter, parseOrgKeywords } from '../../utils/frontmatter.js';
import { identifierFromFilename } from '../../utils/slugify.js';
import { formatDate, fromUtcCalendar, parseDateText, parseIdentifierDate } from '../../utils/timestamp.js';
import { NoteNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { MetadataEnvironment, Note, NoteFormat } from '../../types/index.js';

const NOTE_EXTENSIONS: Record<string, NoteFormat> = {
  '.org': 'org',
  '.md': 'markdown',
};

/**
 * Note format for a path, or null when the file is not a note
 */
export function noteFormat(path: string): NoteFormat | null {
  return NOTE_EXTENSIONS[extname(path).toLowerCase()] ?? null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function nonEmpty(text: string | undefined): string | undefined {
  return text && text.trim() ? text.trim() : undefined;
}

/**
 * Creation date: the declared date, else the identifier's timestamp
 */
function creationDate(declared: Date | undefined, identifier: string): Date | undefined {
  return declared ?? parseIdentifierDate(identifier);
}

function parseOrgNote(path: string, raw: string): Note {
  const { keywords, body } = parseOrgKeywords(raw);
  const identifier = nonEmpty(keywords.get('IDENTIFIER')) ?? identifierFromFilename(basename(path));
  const declaredDate = keywords.get('DATE');

  const environment: MetadataEnvironment = {
    tags: (keywords.get('FILETAGS') ?? '').split(/[:\s]+/).filter(Boolean),
    options: keywords,
  };

  const title = nonEmpty(keywords.get('TITLE'));
  if (title !== undefined) environment.title = title;

  const created = creationDate(declaredDate ? parseDateText(declaredDate) : undefined, identifier);
  if (created) environment.created = created;

  const aliases = keywords.get('ALIASES');
  if (aliases !== undefined) environment.aliases = aliases;

  const category = nonEmpty(keywords.get('CATEGORY'));
  if (category !== undefined) environment.category = category;

  return { path, identifier, format: 'org', environment, body };
}

/**
 * Convert a YAML value into option-table form: dates become YYYY-MM-DD,
 * booleans their bare words. Anything else is kept for the quoting
 * engine to accept or reject.
 */
function normalizeYamlValue(value: unknown): unknown {
  if (value instanceof Date) {
    return formatDate(fromUtcCalendar(value));
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return value.map(normalizeYamlValue);
  }
  return value;
}

function yamlDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : fromUtcCalendar(value);
  }
  if (typeof value === 'string') {
    return parseDateText(value);
  }
  return undefined;
}

function yamlTags(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map(normalizeYamlValue);
  if (typeof value === 'string') return value.split(/\s+/).filter(Boolean);
  return [value];
}

function parseMarkdownNote(path: string, raw: string): Note {
  const { frontmatter, body } = parseFrontmatter(raw);
  const declaredId = frontmatter.identifier;
  const identifier =
    typeof declaredId === 'string' && declaredId.trim()
      ? declaredId.trim()
      : identifierFromFilename(basename(path));

  const options = new Map<string, unknown>();
  for (const [key, value] of Object.entries(frontmatter)) {
    options.set(key, normalizeYamlValue(value));
  }

  const environment: MetadataEnvironment = {
    tags: yamlTags(frontmatter.tags),
    options,
  };

  if (typeof frontmatter.title === 'string') {
    const title = nonEmpty(frontmatter.title);
    if (title !== undefined) environment.title = title;
  }

  const created = creationDate(yamlDate(frontmatter.date), identifier);
  if (created) environment.created = created;

  const aliases = frontmatter.aliases;
  if (typeof aliases === 'string') {
    environment.aliases = aliases;
  } else if (Array.isArray(aliases)) {
    environment.aliases = aliases.map(String).join(' ');
  }

  if (typeof frontmatter.category === 'string') {
    const category = nonEmpty(frontmatter.category);
    if (category !== undefined) environment.category = category;
  }

  return { path, identifier, format: 'markdown', environment, body };
}

/**
 * Parse raw note text. `path` decides the format.
 */
export function parseNote(path: string, raw: string): Note {
  const format = noteFormat(path);
  if (format === 'org') return parseOrgNote(path, raw);
  if (format === 'markdown') return parseMarkdownNote(path, raw);
  throw new Error(`Unsupported note format: ${path}`);
}

/**
 * Read a single note by path (relative to notesDir, or absolute)
 *
 * @throws NoteNotFoundError when the file does not exist
 */
export async function readNote(notePath: string, notesDir: string): Promise<Note> {
  const fullPath = isAbsolute(notePath) ? notePath : join(notesDir, notePath);

  try {
    const raw = await readFile(fullPath, 'utf-8');
    return parseNote(notePath, raw);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new NoteNotFoundError(notePath);
    }
    logger.error(`Failed to read note: ${notePath}`, error);
    throw error;
  }
}

/**
 * List note files under a directory, relative to notesDir.
 * Hidden files and directories are skipped.
 */
export async function listNotes(notesDir: string, dirPath = ''): Promise<string[]> {
  const notes: string[] = [];

  try {
    const entries = await readdir(join(notesDir, dirPath), { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const entryPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        notes.push(...(await listNotes(notesDir, entryPath)));
      } else if (entry.isFile() && noteFormat(entry.name)) {
        notes.push(entryPath);
      }
    }
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      logger.error(`Failed to list notes in: ${dirPath || notesDir}`, error);
      throw error;
    }
  }

  return notes.sort();
}

/**
 * Map every note identifier in the corpus to its path.
 * Notes that cannot be read are logged and left out, so one broken note
 * does not block publishing the others.
 */
export async function buildIdentifierIndex(notesDir: string): Promise<Map<string, string>> {
  const index = new Map<string, string>();

  for (const path of await listNotes(notesDir)) {
    let note: Note;
    try {
      note = await readNote(path, notesDir);
    } catch (error) {
      logger.warn(`Skipping unreadable note ${path}`, error);
      continue;
    }
    const existing = index.get(note.identifier);
    if (existing) {
      logger.warn(`Duplicate note identifier ${note.identifier}`, { kept: existing, skipped: path });
      continue;
    }
    index.set(note.identifier, path);
  }

  return index;
}
