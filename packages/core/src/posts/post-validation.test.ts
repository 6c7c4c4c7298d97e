import { describe, it, expect } from 'vitest';
import { isValidPostDate, parsePostDraft, parsePostPatch } from './post-validation.js';
import { InvalidInputError } from '../types/errors.js';

const VALID_DRAFT = {
  title: 'Hello',
  content: 'World',
  author: 'Ada',
  date: '2024-02-29',
};

describe('isValidPostDate', () => {
  it('should accept real calendar dates', () => {
    expect(isValidPostDate('2023-01-01')).toBe(true);
    expect(isValidPostDate('2024-02-29')).toBe(true);
    expect(isValidPostDate('1999-12-31')).toBe(true);
  });

  it('should reject impossible months and days', () => {
    expect(isValidPostDate('2023-13-01')).toBe(false);
    expect(isValidPostDate('2023-00-10')).toBe(false);
    expect(isValidPostDate('2023-02-29')).toBe(false);
    expect(isValidPostDate('2023-04-31')).toBe(false);
    expect(isValidPostDate('2023-01-00')).toBe(false);
  });

  it('should reject other layouts', () => {
    expect(isValidPostDate('2023-1-01')).toBe(false);
    expect(isValidPostDate('2023-1-5')).toBe(false);
    expect(isValidPostDate('01-01-2023')).toBe(false);
    expect(isValidPostDate('2023/01/01')).toBe(false);
    expect(isValidPostDate('2023-01-01T00:00:00Z')).toBe(false);
    expect(isValidPostDate('')).toBe(false);
  });
});

describe('parsePostDraft', () => {
  it('should return the draft when every field is valid', () => {
    const result = parsePostDraft({ ...VALID_DRAFT, extra: 'ignored' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual(VALID_DRAFT);
    }
  });

  it('should name a single missing field', () => {
    const { author: _author, ...rest } = VALID_DRAFT;
    const result = parsePostDraft(rest);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidInputError);
      expect(result.error.message).toBe('Missing fields: author');
    }
  });

  it('should list every missing field in field order', () => {
    const result = parsePostDraft({ content: 'only content' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Missing fields: title, author, date');
    }
  });

  it('should treat null as missing', () => {
    const result = parsePostDraft({ ...VALID_DRAFT, title: null });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Missing fields: title');
    }
  });

  it('should reject a non-string field', () => {
    const result = parsePostDraft({ ...VALID_DRAFT, content: 42 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Invalid field type: content must be a string');
    }
  });

  it('should reject a date that does not parse', () => {
    const result = parsePostDraft({ ...VALID_DRAFT, date: '2023-13-01' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidInputError);
      expect(result.error.message).toBe('Invalid date format. Use YYYY-MM-DD.');
    }
  });

  it('should report missing fields before a bad date', () => {
    const result = parsePostDraft({ title: 'x', content: 'y', date: 'not-a-date' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Missing fields: author');
    }
  });
});

describe('parsePostPatch', () => {
  it('should keep only known fields that are present', () => {
    const result = parsePostPatch({ title: 'X', unknown: 'dropped' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ title: 'X' });
    }
  });

  it('should not validate the date format', () => {
    const result = parsePostPatch({ date: 'whenever' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ date: 'whenever' });
    }
  });

  it('should accept an empty patch', () => {
    const result = parsePostPatch({});

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({});
    }
  });

  it('should reject a non-string field', () => {
    const result = parsePostPatch({ author: ['a', 'b'] });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Invalid field type: author must be a string');
    }
  });
});
