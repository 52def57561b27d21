import { describe, it, expect } from 'vitest';
import {
  formatDate,
  fromUtcCalendar,
  isIdentifier,
  isTimestamp,
  parseDateText,
  parseIdentifierDate,
} from '../../../src/utils/timestamp.js';

describe('isTimestamp', () => {
  it('accepts date and date-time forms', () => {
    expect(isTimestamp('2024-01-04')).toBe(true);
    expect(isTimestamp('2024-01-04T09:30:00')).toBe(true);
    expect(isTimestamp('2024-01-04T09:30:00Z')).toBe(true);
    expect(isTimestamp('2024-01-04T09:30:00+02:00')).toBe(true);
  });

  it('accepts an offset with or without a time part', () => {
    expect(isTimestamp('2024-01-04Z')).toBe(true);
    expect(isTimestamp('2024-01-04-05:00')).toBe(true);
  });

  it('rejects other text', () => {
    expect(isTimestamp('2024-1-4')).toBe(false);
    expect(isTimestamp('2024-01-04 09:30')).toBe(false);
    expect(isTimestamp('2024-01-04+2')).toBe(false);
    expect(isTimestamp('today')).toBe(false);
  });
});

describe('formatDate', () => {
  it('pads month and day', () => {
    expect(formatDate(new Date(2024, 0, 4, 23, 59))).toBe('2024-01-04');
    expect(formatDate(new Date(2026, 9, 18))).toBe('2026-10-18');
  });
});

describe('identifiers', () => {
  it('recognises identifiers', () => {
    expect(isIdentifier('20240104T093000')).toBe(true);
    expect(isIdentifier('20240104-093000')).toBe(false);
  });

  it('reads the creation time from an identifier', () => {
    expect(parseIdentifierDate('20240104T093000')).toEqual(new Date(2024, 0, 4, 9, 30, 0));
    expect(parseIdentifierDate('plain-note')).toBeUndefined();
    expect(parseIdentifierDate('20240231T000000')).toBeUndefined();
  });
});

describe('parseDateText', () => {
  it('parses Org timestamps', () => {
    expect(parseDateText('[2024-01-04 Thu 09:30]')).toEqual(new Date(2024, 0, 4, 9, 30));
    expect(parseDateText('<2024-01-04 Thu>')).toEqual(new Date(2024, 0, 4));
  });

  it('parses ISO dates in local time', () => {
    expect(parseDateText('2024-01-04')).toEqual(new Date(2024, 0, 4));
    expect(parseDateText('2024-01-04T09:30:15')).toEqual(new Date(2024, 0, 4, 9, 30, 15));
  });

  it('keeps the calendar day of a date with an offset only', () => {
    expect(parseDateText('2024-01-04Z')).toEqual(new Date(2024, 0, 4));
    expect(parseDateText('2024-01-04-05:00')).toEqual(new Date(2024, 0, 4));
  });

  it('honours an explicit offset', () => {
    expect(parseDateText('2024-01-04T09:30:00Z')?.toISOString()).toBe('2024-01-04T09:30:00.000Z');
  });

  it('rejects impossible and unknown dates', () => {
    expect(parseDateText('2024-02-31')).toBeUndefined();
    expect(parseDateText('next week')).toBeUndefined();
  });
});

describe('fromUtcCalendar', () => {
  it('keeps the UTC calendar day in local time', () => {
    expect(formatDate(fromUtcCalendar(new Date(Date.UTC(2024, 1, 10))))).toBe('2024-02-10');
  });
});
