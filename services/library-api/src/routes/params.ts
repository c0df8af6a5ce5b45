import { z } from 'zod';
import type { BookCriteria, PageRequest, ProductCriteria } from '@library/shared';
import { parseWith } from '../validation/parse';

// Query strings only carry text, so numbers and booleans are parsed here
const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// An empty filter (`?genre=`) means no filter
const queryText = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const queryInt = z.coerce.number().int();
const queryNumber = z.coerce.number();

const pageQuery = {
  skip: queryInt.min(0).default(0),
  limit: queryInt.min(1).max(100).optional(),
};

const bookListQuery = z.object({
  genre: queryText,
  author: queryText,
  available: queryBoolean.optional(),
  min_pages: queryInt.min(0).optional(),
  max_pages: queryInt.min(0).optional(),
  ...pageQuery,
});

const authorSearchQuery = z.object({
  genre: queryText,
  available: queryBoolean.optional(),
});

const productListQuery = z.object({
  category: queryText,
  min_price: queryNumber.min(0).optional(),
  max_price: queryNumber.min(0).optional(),
  in_stock: queryBoolean.optional(),
  ...pageQuery,
});

const categorySearchQuery = z.object({
  min_price: queryNumber.min(0).optional(),
  max_price: queryNumber.min(0).optional(),
  in_stock: queryBoolean.optional(),
});

const idParam = z.coerce.number().int().positive();

export interface ListQuery<TCriteria> {
  criteria: TCriteria;
  page: PageRequest;
}

export function parseId(raw: unknown): number {
  return parseWith(idParam, raw, 'id');
}

export function parseBookListQuery(query: unknown, defaultLimit: number): ListQuery<BookCriteria> {
  const parsed = parseWith(bookListQuery, query, 'query');
  return {
    criteria: {
      genre: parsed.genre,
      author: parsed.author,
      available: parsed.available,
      minPages: parsed.min_pages,
      maxPages: parsed.max_pages,
    },
    page: { skip: parsed.skip, limit: parsed.limit ?? defaultLimit },
  };
}

export function parseAuthorSearchQuery(query: unknown): Pick<BookCriteria, 'genre' | 'available'> {
  return parseWith(authorSearchQuery, query, 'query');
}

export function parseProductListQuery(
  query: unknown,
  defaultLimit: number
): ListQuery<ProductCriteria> {
  const parsed = parseWith(productListQuery, query, 'query');
  return {
    criteria: {
      category: parsed.category,
      minPrice: parsed.min_price,
      maxPrice: parsed.max_price,
      inStock: parsed.in_stock,
    },
    page: { skip: parsed.skip, limit: parsed.limit ?? defaultLimit },
  };
}

export function parseCategorySearchQuery(
  query: unknown
): Pick<ProductCriteria, 'minPrice' | 'maxPrice' | 'inStock'> {
  const parsed = parseWith(categorySearchQuery, query, 'query');
  return { minPrice: parsed.min_price, maxPrice: parsed.max_price, inStock: parsed.in_stock };
}
