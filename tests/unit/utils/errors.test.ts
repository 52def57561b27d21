import { describe, it, expect } from 'vitest';
import {
  describeValue,
  DuplicateIdentifierError,
  InvalidListElementError,
  NoteNotFoundError,
  PublishError,
  toErrorInfo,
} from '../../../src/utils/errors.js';

describe('describeValue', () => {
  it('describes values for messages', () => {
    expect(describeValue('')).toBe('""');
    expect(describeValue(null)).toBe('null');
    expect(describeValue(undefined)).toBe('undefined');
    expect(describeValue(3)).toBe('3');
    expect(describeValue(false)).toBe('false');
    expect(describeValue([1, 2])).toBe('array(2)');
    expect(describeValue({ a: 1 })).toBe('object');
    expect(describeValue(new Date(Number.NaN))).toBe('Date(invalid)');
  });
});

describe('publish errors', () => {
  it('carries field and code', () => {
    const error = new InvalidListElementError('tags', '');
    expect(error).toBeInstanceOf(PublishError);
    expect(error.code).toBe('INVALID_LIST_ELEMENT');
    expect(error.field).toBe('tags');
    expect(error.message).toBe('Invalid element in list field "tags": ""');
  });
});

describe('DuplicateIdentifierError', () => {
  it('names both notes', () => {
    const error = new DuplicateIdentifierError('20240101T120000', 'a.org');
    expect(error.code).toBe('DUPLICATE_IDENTIFIER');
    expect(error.message).toBe('Duplicate note identifier 20240101T120000 (already used by a.org)');
  });
});

describe('toErrorInfo', () => {
  it('uses the code of publish errors', () => {
    expect(toErrorInfo(new NoteNotFoundError('a.org'), 'READ_ERROR')).toEqual({
      error: 'Note not found: a.org',
      code: 'NOTE_NOT_FOUND',
    });
  });

  it('falls back for other errors', () => {
    expect(toErrorInfo(new Error('boom'), 'READ_ERROR')).toEqual({ error: 'boom', code: 'READ_ERROR' });
    expect(toErrorInfo('text', 'READ_ERROR')).toEqual({ error: 'text', code: 'READ_ERROR' });
  });
});
