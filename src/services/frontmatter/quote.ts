/**
 * Scalar quoting engine
 *
 * Turns one metadata value into a YAML scalar literal. Strings that are
 * already valid bare or self-quoted scalars (pre-quoted text, true/false,
 * timestamps) pass through untouched; the check runs before escaping so
 * they are never escaped twice.
 */

import type { Atom } from '../../types/index.js';
import { isTimestamp } from '../../utils/timestamp.js';
import { MalformedScalarError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface QuoteOptions {
  /**
   * Render malformed values as `""` with a warning instead of throwing
   */
  lenient?: boolean;
}

/**
 * Create a symbolic atom
 */
export function atom(name: string): Atom {
  return { kind: 'atom', name };
}

export function isAtom(value: unknown): value is Atom {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'atom' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

/**
 * Strings YAML reads back as-is without extra quoting
 */
export function isSelfQuoting(text: string): boolean {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return true;
  }
  return text === 'true' || text === 'false' || isTimestamp(text);
}

/**
 * Escape and double-quote a string.
 * Backslashes first, then quotes; line breaks become escapes so the
 * scalar stays on one line.
 */
export function doubleQuote(text: string): string {
  const escaped = text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

/**
 * Render a value as a YAML scalar literal.
 *
 * - absent → empty text (callers drop the field before getting here)
 * - finite number → unquoted decimal form
 * - atom → double-quoted name
 * - string → unchanged when self-quoting, escaped and double-quoted otherwise
 */
export function quoteScalar(value: unknown, options: QuoteOptions = {}): string {
  if (value === undefined || value === null) {
    return '';
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  if (isAtom(value)) {
    return doubleQuote(value.name);
  }

  if (typeof value === 'string') {
    return isSelfQuoting(value) ? value : doubleQuote(value);
  }

  if (options.lenient) {
    logger.warn('Malformed scalar rendered as empty string', { type: typeof value });
    return '""';
  }
  throw new MalformedScalarError(value);
}
