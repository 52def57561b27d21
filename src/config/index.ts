/**
 * Configuration loading and validation
 *
 * Sources, highest precedence first: NOTE_PUBLISHER_* environment
 * variables, the YAML config file (NOTE_PUBLISHER_CONFIG_PATH or
 * ~/.config/note-publisher/config.yaml), built-in defaults.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { FieldDescriptor, PublishConfig } from '../types/index.js';

export const DEFAULT_FRONT_MATTER_FIELDS: readonly FieldDescriptor[] = [
  'title',
  'date',
  'last_updated_at',
  'aliases',
  'tags',
  'category',
];
export const DEFAULT_LINK_CLASS = 'internal-link';
export const DEFAULT_PUBLISH_DIR = 'posts';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Zod schema for the YAML config file
const fileConfigSchema = z
  .object({
    notes_dir: z.string().min(1).optional(),
    base_dir: z.string().min(1).optional(),
    publish_dir: z.string().min(1).optional(),
    link_class: z.string().min(1).optional(),
    front_matter_fields: z.array(z.string().min(1)).min(1).optional(),
    log_level: logLevelSchema.optional(),
    watch_enabled: z.boolean().optional(),
  })
  .strict();

/**
 * Split a field list given as `title, date tags`; order and duplicates kept
 */
export function splitFieldList(value: string): string[] {
  return value.split(/[\s,]+/).filter((field) => field.length > 0);
}

// Environment variable schema
const envSchema = z.object({
  NOTE_PUBLISHER_CONFIG_PATH: z.string().min(1).optional(),
  NOTE_PUBLISHER_NOTES_DIR: z.string().min(1).optional(),
  NOTE_PUBLISHER_BASE_DIR: z.string().min(1).optional(),
  NOTE_PUBLISHER_PUBLISH_DIR: z.string().min(1).optional(),
  NOTE_PUBLISHER_LINK_CLASS: z.string().min(1).optional(),
  NOTE_PUBLISHER_FRONT_MATTER_FIELDS: z
    .string()
    .transform(splitFieldList)
    .pipe(z.array(z.string()).min(1, 'at least one field is required'))
    .optional(),
  NOTE_PUBLISHER_LOG_LEVEL: logLevelSchema.optional(),
  NOTE_PUBLISHER_WATCH_ENABLED: z
    .string()
    .transform((v) => v.toLowerCase() !== 'false')
    .optional(),
});

function formatIssues(title: string, error: z.ZodError): string {
  const issues = error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
  return `${title}:\n${issues}`;
}

/**
 * Expand a leading ~ and resolve to an absolute path
 */
export function expandPath(path: string, base = process.cwd()): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return resolve(base, path);
}

function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'note-publisher', 'config.yaml');
}

/**
 * Read and validate the YAML config file. Returns an empty object when no
 * file exists at the default location.
 */
export function loadConfigFile(configPath?: string): z.infer<typeof fileConfigSchema> {
  const path = configPath ?? getDefaultConfigPath();

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Configuration error:\n  - config file not found: ${configPath}`);
    }
    return {};
  }

  const raw: unknown = parseYaml(readFileSync(path, 'utf-8')) ?? {};
  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(`Invalid config file ${path}`, result.error));
  }

  logger.debug(`Loaded config from ${path}`);
  return result.data;
}

/**
 * Build the immutable publishing configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PublishConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(formatIssues('Configuration error', result.error));
  }

  const vars = result.data;
  const file = loadConfigFile(vars.NOTE_PUBLISHER_CONFIG_PATH);

  const notesDir = vars.NOTE_PUBLISHER_NOTES_DIR ?? file.notes_dir;
  if (!notesDir) {
    throw new ConfigError(
      'Configuration error:\n  - notes directory is required ' +
        '(NOTE_PUBLISHER_NOTES_DIR or notes_dir in config.yaml)'
    );
  }

  const resolvedNotesDir = expandPath(notesDir);
  const baseDir = vars.NOTE_PUBLISHER_BASE_DIR ?? file.base_dir;
  const fields = vars.NOTE_PUBLISHER_FRONT_MATTER_FIELDS ?? file.front_matter_fields ?? DEFAULT_FRONT_MATTER_FIELDS;

  return Object.freeze({
    notesDir: resolvedNotesDir,
    baseDir: baseDir ? expandPath(baseDir) : resolvedNotesDir,
    publishDir: vars.NOTE_PUBLISHER_PUBLISH_DIR ?? file.publish_dir ?? DEFAULT_PUBLISH_DIR,
    linkClass: vars.NOTE_PUBLISHER_LINK_CLASS ?? file.link_class ?? DEFAULT_LINK_CLASS,
    frontMatterFields: Object.freeze([...fields]),
    logLevel: vars.NOTE_PUBLISHER_LOG_LEVEL ?? file.log_level ?? 'info',
    watchEnabled: vars.NOTE_PUBLISHER_WATCH_ENABLED ?? file.watch_enabled ?? false,
  });
}

// Singleton config instance
let configInstance: PublishConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): PublishConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
