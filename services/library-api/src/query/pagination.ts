import { ValidationError } from '../errors';

export const MAX_PAGE_LIMIT = 100;

/**
 * Return `sequence[skip, skip + limit)`, clipped to the sequence.
 * A skip past the end yields an empty page; out-of-range arguments throw.
 */
export function paginate<T>(sequence: readonly T[], skip: number, limit: number): T[] {
  if (!Number.isInteger(skip) || skip < 0) {
    throw ValidationError.forField('skip', 'must be an integer greater than or equal to 0');
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw ValidationError.forField('limit', `must be an integer between 1 and ${MAX_PAGE_LIMIT}`);
  }

  return sequence.slice(skip, skip + limit);
}
