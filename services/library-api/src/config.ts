import path from 'path';
import dotenv from 'dotenv';
import type { AuthorMatchMode } from '@library/shared';

dotenv.config();

// Seed files are looked up relative to the directory the process starts in (the repo root)
const dataDir = path.resolve(process.cwd(), 'services', 'library-api', 'data');

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parsePageLimit(value: string | undefined): number {
  const limit = parseIntOr(value, 10);
  return limit >= 1 && limit <= 100 ? limit : 10;
}

function parseAuthorMatch(value: string | undefined): AuthorMatchMode {
  return value === 'exact' ? 'exact' : 'substring';
}

export const config = {
  port: parseIntOr(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  seed: {
    booksFile: process.env.BOOKS_SEED_FILE || path.join(dataDir, 'books.json'),
    productsFile: process.env.PRODUCTS_SEED_FILE || path.join(dataDir, 'products.json'),
  },
  query: {
    authorMatch: parseAuthorMatch(process.env.AUTHOR_MATCH),
    defaultPageLimit: parsePageLimit(process.env.DEFAULT_PAGE_LIMIT),
  },
};
