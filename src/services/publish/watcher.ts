/**
 * File system watcher using chokidar
 * Re-publishes notes when they change and removes output for deleted notes
 */

import { watch, type FSWatcher } from 'chokidar';
import { relative } from 'path';
import { noteFormat } from '../notes/index.js';
import { logger } from '../../utils/logger.js';
import type { PublishConfig } from '../../types/index.js';
import { publishNote, unpublishNote, type PublishOptions } from './publisher.js';

const DEBOUNCE_MS = 300;

interface NotesWatcher {
  watcher: FSWatcher;
  debounceMap: Map<string, NodeJS.Timeout>;
}

let active: NotesWatcher | null = null;

function debounce(entry: NotesWatcher, path: string, callback: () => Promise<void>): void {
  const existing = entry.debounceMap.get(path);
  if (existing) {
    clearTimeout(existing);
  }

  const timeout = setTimeout(() => {
    entry.debounceMap.delete(path);
    callback().catch((error: unknown) => {
      logger.error(`Watcher callback failed for ${path}`, error);
    });
  }, DEBOUNCE_MS);

  entry.debounceMap.set(path, timeout);
}

async function handleFileChange(config: PublishConfig, fullPath: string, options: PublishOptions): Promise<void> {
  const notePath = relative(config.notesDir, fullPath);
  logger.debug(`Note changed: ${notePath}`);

  try {
    const result = await publishNote(config, notePath, options);
    logger.info(`Re-published ${notePath} → ${result.outputPath}`);
  } catch (error) {
    logger.error(`Failed to re-publish ${notePath}`, error);
  }
}

async function handleFileDelete(config: PublishConfig, fullPath: string, options: PublishOptions): Promise<void> {
  const notePath = relative(config.notesDir, fullPath);
  const outputPath = await unpublishNote(config, notePath, options);
  logger.info(`Removed ${outputPath} for deleted note ${notePath}`);
}

/**
 * Start watching the notes directory. No-op when already running.
 */
export function startWatcher(config: PublishConfig, options: PublishOptions = {}): void {
  if (active) {
    logger.warn('Watcher already running');
    return;
  }

  logger.info(`Starting file watcher at: ${config.notesDir}`);

  const watcher = watch(config.notesDir, {
    ignored: /(^|[/\\])\../,
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 200,
      pollInterval: 100,
    },
  });

  const entry: NotesWatcher = { watcher, debounceMap: new Map() };

  watcher
    .on('add', (path) => {
      if (!noteFormat(path)) return;
      debounce(entry, path, () => handleFileChange(config, path, options));
    })
    .on('change', (path) => {
      if (!noteFormat(path)) return;
      debounce(entry, path, () => handleFileChange(config, path, options));
    })
    .on('unlink', (path) => {
      if (!noteFormat(path)) return;
      debounce(entry, path, () => handleFileDelete(config, path, options));
    })
    .on('error', (error) => {
      logger.error('Watcher error', error);
    })
    .on('ready', () => {
      logger.info('File watcher ready');
    });

  active = entry;
}

/**
 * Stop the watcher and drop pending events
 */
export async function stopWatcher(): Promise<void> {
  if (!active) return;

  const entry = active;
  active = null;
  for (const timeout of entry.debounceMap.values()) {
    clearTimeout(timeout);
  }
  entry.debounceMap.clear();
  await entry.watcher.close();
  logger.info('File watcher stopped');
}

export function isWatching(): boolean {
  return active !== null;
}
