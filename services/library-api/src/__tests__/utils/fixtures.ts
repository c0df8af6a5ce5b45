import type { BookInput, ProductInput } from '@library/shared';

/**
 * Valid book input; override any field per test.
 */
export function makeBookInput(overrides: Partial<BookInput> = {}): BookInput {
  return {
    title: 'Test Book',
    author: 'Test Author',
    isbn: '9780000000001',
    published_year: 2000,
    pages: 100,
    available: true,
    genre: 'Fiction',
    ...overrides,
  };
}

export function makeProductInput(overrides: Partial<ProductInput> = {}): ProductInput {
  return {
    name: 'Test Product',
    price: 10,
    category: 'General',
    in_stock: true,
    ...overrides,
  };
}
