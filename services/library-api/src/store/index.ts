import type { Book, BookInput, BookPatch, Product, ProductInput, ProductPatch } from '@library/shared';
import { RecordStore } from './RecordStore';
import { validateBookInput, validateBookPatch } from '../validation/bookSchemas';
import { validateProductInput, validateProductPatch } from '../validation/productSchemas';

export { RecordStore } from './RecordStore';
export type { BulkLoadResult, RecordStoreOptions, RejectedRecord } from './RecordStore';

export type BookStore = RecordStore<Book, BookInput, BookPatch>;
export type ProductStore = RecordStore<Product, ProductInput, ProductPatch>;

export function createBookStore(now?: () => Date): BookStore {
  return new RecordStore<Book, BookInput, BookPatch>({
    resource: 'Book',
    validateInput: validateBookInput,
    validatePatch: validateBookPatch,
    build: (id, input, createdAt) => ({
      id,
      title: input.title,
      author: input.author,
      isbn: input.isbn,
      published_year: input.published_year,
      pages: input.pages,
      available: input.available,
      genre: input.genre,
      summary: input.summary ?? null,
      added_at: createdAt,
    }),
    now,
  });
}

export function createProductStore(now?: () => Date): ProductStore {
  return new RecordStore<Product, ProductInput, ProductPatch>({
    resource: 'Product',
    validateInput: validateProductInput,
    validatePatch: validateProductPatch,
    build: (id, input, createdAt) => ({
      id,
      name: input.name,
      price: input.price,
      category: input.category,
      in_stock: input.in_stock,
      description: input.description ?? null,
      created_at: createdAt,
    }),
    now,
  });
}
