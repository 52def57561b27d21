/**
 * Front-matter synthesizer
 *
 * Walks the configured descriptors in order and assembles the YAML block
 * between `---` separator lines. Fields that resolve to nothing are
 * dropped; descriptors are never reordered or deduplicated.
 */

import type { FieldDescriptor, MetadataEnvironment } from '../../types/index.js';
import { classifyField, resolveField } from './fields.js';
import { serializeList } from './list.js';
import { quoteScalar, type QuoteOptions } from './quote.js';

export const FRONT_MATTER_SEPARATOR = '---';

export interface SynthesizeOptions extends QuoteOptions {
  /** Publish time used for `last_updated_at` (defaults to the current time) */
  now?: Date;
}

/**
 * Absent values, empty strings and empty sequences produce no line
 */
function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Render one `key: value` line, or null when the field is omitted
 */
export function renderField(
  descriptor: FieldDescriptor,
  env: MetadataEnvironment,
  options: SynthesizeOptions = {}
): string | null {
  const value = resolveField(classifyField(descriptor), env, options.now ?? new Date());
  if (isEmptyValue(value)) {
    return null;
  }

  const rendered = Array.isArray(value)
    ? serializeList(descriptor, value)
    : quoteScalar(value, options);

  return `${descriptor}: ${rendered}`;
}

/**
 * Synthesize the front-matter block for one note.
 *
 * @throws InvalidListElementError when a sequence field holds an invalid element
 * @throws MalformedScalarError for unrenderable scalars unless `lenient` is set
 */
export function synthesizeFrontMatter(
  fields: readonly FieldDescriptor[],
  env: MetadataEnvironment,
  options: SynthesizeOptions = {}
): string {
  const now = options.now ?? new Date();
  const lines: string[] = [];

  for (const descriptor of fields) {
    const line = renderField(descriptor, env, { ...options, now });
    if (line !== null) {
      lines.push(line);
    }
  }

  const body = lines.map((line) => `${line}\n`).join('');
  return `${FRONT_MATTER_SEPARATOR}\n${body}${FRONT_MATTER_SEPARATOR}\n`;
}
