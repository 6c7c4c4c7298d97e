import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { POST_FIELDS, type PostDraft, type PostPatch } from '../types/post.js';
import { InvalidInputError } from '../types/errors.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const postDraftSchema = z.object({
  title: z.string(),
  content: z.string(),
  author: z.string(),
  date: z.string(),
});

const postPatchSchema = postDraftSchema.partial();

/**
 * Returns `true` when `value` is a real calendar date written as `YYYY-MM-DD`.
 * `2023-02-29` and `2023-13-01` are rejected.
 */
export function isValidPostDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;

  // Day 0 of the following month is the last day of `month`.
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function typeError(error: z.ZodError): InvalidInputError {
  const field = error.issues[0]?.path.join('.') ?? 'body';
  return new InvalidInputError(`Invalid field type: ${field} must be a string`);
}

/**
 * Validate the body of a create request.
 *
 * Missing fields are reported together, in field order, before any type or
 * date check runs.
 */
export function parsePostDraft(input: Record<string, unknown>): Result<PostDraft, InvalidInputError> {
  const missing = POST_FIELDS.filter((field) => input[field] === undefined || input[field] === null);
  if (missing.length > 0) {
    return err(new InvalidInputError(`Missing fields: ${missing.join(', ')}`));
  }

  const parsed = postDraftSchema.safeParse(input);
  if (!parsed.success) {
    return err(typeError(parsed.error));
  }

  if (!isValidPostDate(parsed.data.date)) {
    return err(new InvalidInputError('Invalid date format. Use YYYY-MM-DD.'));
  }

  return ok(parsed.data);
}

/**
 * Validate the body of an update request. Unknown keys are dropped and the
 * date is taken as given.
 */
export function parsePostPatch(input: Record<string, unknown>): Result<PostPatch, InvalidInputError> {
  const parsed = postPatchSchema.safeParse(input);
  if (!parsed.success) {
    return err(typeError(parsed.error));
  }

  const patch: PostPatch = {};
  for (const field of POST_FIELDS) {
    const value = parsed.data[field];
    if (value !== undefined) {
      patch[field] = value;
    }
  }
  return ok(patch);
}
