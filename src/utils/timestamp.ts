/**
 * Timestamp detection and date formatting
 *
 * TIMESTAMP_PATTERN is the single source of truth for "date-shaped" text:
 * the quoting engine uses it to leave timestamps bare, and the note reader
 * uses it to accept date keywords.
 */

// YYYY-MM-DD, optionally THH:MM:SS, optionally Z or ±HH:MM
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}:\d{2})?(?:Z|[+-]\d{2}:\d{2})?$/;

const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}:\d{2})$/;

// Denote-style identifier: 20240104T093000
const IDENTIFIER_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;

// Org timestamp body: 2024-01-04 Thu 09:30
const ORG_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:\s+[^\d\s]+)?(?:\s+(\d{1,2}):(\d{2}))?$/;

/**
 * Check whether text is a bare YAML timestamp
 */
export function isTimestamp(text: string): boolean {
  return TIMESTAMP_PATTERN.test(text);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Build a local date, rejecting out-of-range parts (2024-02-31 etc.)
 */
function localDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | undefined {
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours ||
    date.getMinutes() !== minutes
  ) {
    return undefined;
  }
  return date;
}

/**
 * Check whether text is a Denote identifier
 */
export function isIdentifier(text: string): boolean {
  return IDENTIFIER_PATTERN.test(text);
}

/**
 * Creation time encoded in a Denote identifier
 */
export function parseIdentifierDate(identifier: string): Date | undefined {
  const match = identifier.match(IDENTIFIER_PATTERN);
  if (!match) return undefined;
  const [, y, mo, d, h, mi, s] = match.map(Number);
  if (y === undefined || mo === undefined || d === undefined) return undefined;
  return localDate(y, mo, d, h, mi, s);
}

/**
 * Parse the date forms found in note headers:
 * `[2024-01-04 Thu 09:30]`, `<2024-01-04>`, `2024-01-04`, `2024-01-04T09:30:00Z`
 */
export function parseDateText(text: string): Date | undefined {
  const trimmed = text.trim().replace(/^[[<](.*)[\]>]$/, '$1').trim();

  if (isTimestamp(trimmed)) {
    const [datePart = '', timePart] = trimmed.split('T');
    if (timePart && OFFSET_SUFFIX.test(timePart)) {
      const date = new Date(trimmed);
      return Number.isNaN(date.getTime()) ? undefined : date;
    }
    // A date without a time keeps its calendar day whatever the offset
    const [y = 0, mo = 0, d = 0] = datePart.replace(OFFSET_SUFFIX, '').split('-').map(Number);
    const [h = 0, mi = 0, s = 0] = timePart ? timePart.split(':').map(Number) : [];
    return localDate(y, mo, d, h, mi, s);
  }

  const match = trimmed.match(ORG_DATE_PATTERN);
  if (match) {
    return localDate(
      Number(match[1]),
      Number(match[2]),
      Number(match[3]),
      match[4] ? Number(match[4]) : 0,
      match[5] ? Number(match[5]) : 0
    );
  }

  return undefined;
}

/**
 * YAML loaders give date-only values as UTC midnight.
 * Re-read the UTC calendar fields as local time so formatDate keeps the day.
 */
export function fromUtcCalendar(date: Date): Date {
  return new Date(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds()
  );
}
