/**
 * Publishing: note → front matter + Markdown body → output file
 */

import { join, dirname, basename, resolve } from 'path';
import { mkdir, writeFile, rename, rm } from 'fs/promises';
import { randomUUID } from 'crypto';
import { synthesizeFrontMatter } from '../frontmatter/index.js';
import {
  createLinkHook,
  createReferenceResolver,
  renderMarkdownLink,
  type LinkHook,
} from '../links/index.js';
import { buildIdentifierIndex, convertBody, listNotes, readNote } from '../notes/index.js';
import { identifierFromFilename, publishedFilename } from '../../utils/slugify.js';
import { DuplicateIdentifierError, toErrorInfo } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { FieldDescriptor, Note, PublishConfig } from '../../types/index.js';

/**
 * Publish options
 */
export interface PublishOptions {
  /** Output directory (absolute, or relative to baseDir); defaults to publishDir */
  outputDir?: string;
  /** Publish time used for last_updated_at */
  now?: Date;
  /** Degrade malformed scalars to "" instead of failing the note */
  lenient?: boolean;
  /** Front-matter fields to use instead of the configured ones */
  fields?: readonly FieldDescriptor[];
}

/**
 * A note rendered in memory
 */
export interface RenderedNote {
  source: string;
  identifier: string;
  frontMatter: string;
  body: string;
  content: string;
}

export interface PublishResult extends RenderedNote {
  outputPath: string;
}

export interface PublishFailure {
  source: string;
  error: string;
  code: string;
}

export interface PublishSummary {
  outputDir: string;
  published: PublishResult[];
  failed: PublishFailure[];
}

// Identifier each note was last indexed or published under, by absolute source path
const knownIdentifiers = new Map<string, string>();

function sourceKey(config: PublishConfig, notePath: string): string {
  return resolve(config.notesDir, notePath);
}

function rememberIdentifier(config: PublishConfig, notePath: string, identifier: string): void {
  knownIdentifiers.set(sourceKey(config, notePath), identifier);
}

/**
 * Directory published files go to
 */
export function resolveOutputDir(config: PublishConfig, outputDir?: string): string {
  return resolve(config.baseDir, outputDir ?? config.publishDir);
}

/**
 * Link hook bound to the corpus identifiers and configured style class
 */
export function createCorpusLinkHook(config: PublishConfig, identifiers: Iterable<string>): LinkHook {
  return createLinkHook(
    { resolve: createReferenceResolver(identifiers), fallback: renderMarkdownLink },
    config.linkClass
  );
}

/**
 * Render a parsed note. Throws before producing any output when the
 * front matter cannot be synthesized or a reference does not resolve.
 */
export function renderNote(
  note: Note,
  config: PublishConfig,
  hook: LinkHook,
  options: PublishOptions = {}
): RenderedNote {
  const synthesizeOptions: { now?: Date; lenient?: boolean } = {};
  if (options.now) synthesizeOptions.now = options.now;
  if (options.lenient !== undefined) synthesizeOptions.lenient = options.lenient;

  const frontMatter = synthesizeFrontMatter(
    options.fields ?? config.frontMatterFields,
    note.environment,
    synthesizeOptions
  );
  const body = convertBody(note, hook);

  return {
    source: note.path,
    identifier: note.identifier,
    frontMatter,
    body,
    content: `${frontMatter}${body}`,
  };
}

/**
 * Write through a temporary sibling so a failed write leaves no partial file
 */
export async function writeAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

async function writeRendered(
  config: PublishConfig,
  rendered: RenderedNote,
  outputDir: string
): Promise<PublishResult> {
  const outputPath = join(outputDir, publishedFilename(rendered.identifier));
  await writeAtomic(outputPath, rendered.content);
  rememberIdentifier(config, rendered.source, rendered.identifier);
  logger.debug(`Published ${rendered.source} → ${outputPath}`);
  return { ...rendered, outputPath };
}

/**
 * Render a note without writing it
 */
export async function previewNote(
  config: PublishConfig,
  notePath: string,
  options: PublishOptions = {}
): Promise<RenderedNote> {
  const index = await buildIdentifierIndex(config.notesDir);
  for (const [identifier, path] of index) {
    rememberIdentifier(config, path, identifier);
  }
  const note = await readNote(notePath, config.notesDir);
  return renderNote(note, config, createCorpusLinkHook(config, index.keys()), options);
}

/**
 * Publish a single note
 */
export async function publishNote(
  config: PublishConfig,
  notePath: string,
  options: PublishOptions = {}
): Promise<PublishResult> {
  const rendered = await previewNote(config, notePath, options);
  return writeRendered(config, rendered, resolveOutputDir(config, options.outputDir));
}

/**
 * Publish every note in the corpus. A failing note is reported and
 * skipped; the others are still published. When notes share an
 * identifier the first in path order wins and the rest are reported.
 */
export async function publishAll(
  config: PublishConfig,
  options: PublishOptions = {}
): Promise<PublishSummary> {
  const outputDir = resolveOutputDir(config, options.outputDir);
  const summary: PublishSummary = { outputDir, published: [], failed: [] };

  const notes: Note[] = [];
  for (const path of await listNotes(config.notesDir)) {
    try {
      notes.push(await readNote(path, config.notesDir));
    } catch (error) {
      summary.failed.push({ source: path, ...toErrorInfo(error, 'READ_ERROR') });
    }
  }

  const hook = createCorpusLinkHook(
    config,
    notes.map((note) => note.identifier)
  );

  const owners = new Map<string, string>();

  for (const note of notes) {
    const owner = owners.get(note.identifier);
    if (owner !== undefined) {
      const info = toErrorInfo(new DuplicateIdentifierError(note.identifier, owner), 'PUBLISH_ERROR');
      logger.warn(`Skipping ${note.path}: ${info.error}`);
      summary.failed.push({ source: note.path, ...info });
      continue;
    }
    owners.set(note.identifier, note.path);

    try {
      const rendered = renderNote(note, config, hook, options);
      summary.published.push(await writeRendered(config, rendered, outputDir));
    } catch (error) {
      const info = toErrorInfo(error, 'PUBLISH_ERROR');
      logger.warn(`Failed to publish ${note.path}: ${info.error}`);
      summary.failed.push({ source: note.path, ...info });
    }
  }

  logger.info(`Published ${summary.published.length} notes to ${outputDir}`, {
    failed: summary.failed.length,
  });
  return summary;
}

/**
 * Remove the published file for a note path (used when a note is deleted).
 * The output name comes from the identifier the note was last indexed or
 * published under; the file name is only used for notes never seen.
 *
 * @returns The removed path
 */
export async function unpublishNote(
  config: PublishConfig,
  notePath: string,
  options: Pick<PublishOptions, 'outputDir'> = {}
): Promise<string> {
  const key = sourceKey(config, notePath);
  const identifier = knownIdentifiers.get(key) ?? identifierFromFilename(basename(notePath));
  const outputPath = join(resolveOutputDir(config, options.outputDir), publishedFilename(identifier));
  await rm(outputPath, { force: true });
  knownIdentifiers.delete(key);
  logger.debug(`Unpublished ${notePath}`);
  return outputPath;
}
