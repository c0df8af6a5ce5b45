import type { AuthorMatchMode, Book, BookCriteria, Product, ProductCriteria } from '@library/shared';

/**
 * Case-insensitive author match. `substring` matches when the search text
 * appears anywhere in the author; `exact` requires the whole name.
 */
export function matchesAuthor(
  author: string,
  search: string,
  mode: AuthorMatchMode = 'substring'
): boolean {
  const haystack = author.toLowerCase();
  const needle = search.toLowerCase();
  return mode === 'exact' ? haystack === needle : haystack.includes(needle);
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Narrow books by every supplied criterion (logical AND).
 * Omitted criteria do not constrain; input order is preserved.
 */
export function filterBooks(books: readonly Book[], criteria: BookCriteria = {}): Book[] {
  const { genre, author, available, minPages, maxPages, authorMatch } = criteria;

  return books.filter((book) => {
    if (genre !== undefined && !sameText(book.genre, genre)) return false;
    if (author !== undefined && !matchesAuthor(book.author, author, authorMatch)) return false;
    if (available !== undefined && book.available !== available) return false;
    if (minPages !== undefined && book.pages < minPages) return false;
    if (maxPages !== undefined && book.pages > maxPages) return false;
    return true;
  });
}

export function filterProducts(
  products: readonly Product[],
  criteria: ProductCriteria = {}
): Product[] {
  const { category, minPrice, maxPrice, inStock } = criteria;

  return products.filter((product) => {
    if (category !== undefined && !sameText(product.category, category)) return false;
    if (minPrice !== undefined && product.price < minPrice) return false;
    if (maxPrice !== undefined && product.price > maxPrice) return false;
    if (inStock !== undefined && product.in_stock !== inStock) return false;
    return true;
  });
}
