/**
 * Field resolution policy
 *
 * Every descriptor is classified into a known field kind or a generic
 * option lookup, then resolved against the note's metadata environment.
 */

import type { FieldDescriptor, MetadataEnvironment } from '../../types/index.js';
import { formatDate } from '../../utils/timestamp.js';

export type FieldKind =
  | { kind: 'title' }
  | { kind: 'date' }
  | { kind: 'last_updated_at' }
  | { kind: 'aliases' }
  | { kind: 'tags' }
  | { kind: 'category' }
  | { kind: 'option'; name: string };

const KNOWN_FIELDS = new Set(['title', 'date', 'last_updated_at', 'aliases', 'tags', 'category']);

function isKnownField(name: string): name is Exclude<FieldKind, { kind: 'option' }>['kind'] {
  return KNOWN_FIELDS.has(name);
}

/**
 * Classify a descriptor. Known names match exactly; anything else is an
 * option-table lookup.
 */
export function classifyField(descriptor: FieldDescriptor): FieldKind {
  if (isKnownField(descriptor)) {
    return { kind: descriptor };
  }
  return { kind: 'option', name: descriptor };
}

/**
 * Normalize an option key: `hugo_draft`, `HUGO-DRAFT` and `Hugo-Draft`
 * all become `HUGO-DRAFT`
 */
export function normalizeOptionKey(key: string): string {
  return key.trim().replace(/_/g, '-').toUpperCase();
}

/**
 * Look up an option-table value by descriptor name, case-insensitively
 */
export function lookupOption(options: ReadonlyMap<string, unknown>, name: string): unknown {
  const wanted = normalizeOptionKey(name);
  for (const [key, value] of options) {
    if (normalizeOptionKey(key) === wanted) {
      return value;
    }
  }
  return undefined;
}

// Date fields are emitted as quoted strings so YAML readers keep them as text
function quotedDate(date: Date): string {
  return `"${formatDate(date)}"`;
}

/**
 * Resolve a field against the environment.
 *
 * `last_updated_at` always reflects `now`; `category` never falls back to
 * anything but an explicit annotation.
 */
export function resolveField(field: FieldKind, env: MetadataEnvironment, now: Date): unknown {
  switch (field.kind) {
    case 'title':
      return env.title;
    case 'date':
      return env.created ? quotedDate(env.created) : undefined;
    case 'last_updated_at':
      return quotedDate(now);
    case 'aliases': {
      if (env.aliases === undefined) return undefined;
      return env.aliases.split(/\s+/).filter((token) => token.length > 0);
    }
    case 'tags':
      return env.tags;
    case 'category':
      return env.category;
    case 'option':
      return lookupOption(env.options, field.name);
  }
}
