import { z } from 'zod';
import type { BookInput, BookPatch } from '@library/shared';
import { omitUndefined, parseWith, text } from './parse';

export const bookInputSchema = z.object({
  title: text(1, 200),
  author: text(1, 100),
  isbn: text(13, 13),
  published_year: z.number().int().min(1000).max(2100),
  pages: z.number().int().positive(),
  available: z.boolean().default(true),
  genre: z.string(),
  summary: text(0, 1000).nullable().optional(),
});

export const bookPatchSchema = bookInputSchema.partial();

export function validateBookInput(input: unknown): BookInput {
  return parseWith(bookInputSchema, input);
}

export function validateBookPatch(patch: unknown): BookPatch {
  return omitUndefined(parseWith(bookPatchSchema, patch));
}
