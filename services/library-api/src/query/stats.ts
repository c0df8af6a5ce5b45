import type { Book, CatalogStats, LibraryStats, Product } from '@library/shared';

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

// Group names are free text, so counting goes through a Map: a genre called
// `constructor` or `__proto__` must not collide with Object.prototype
function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const value = key(item);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

/**
 * Summary counters over the whole collection. Genre and author groups keep
 * the values as stored (no case folding).
 */
export function computeLibraryStats(books: readonly Book[]): LibraryStats {
  const total = books.length;
  const available = books.filter((book) => book.available).length;
  const totalPages = books.reduce((sum, book) => sum + book.pages, 0);

  return {
    total_books: total,
    available_books: available,
    borrowed_books: total - available,
    total_pages: totalPages,
    average_pages: total === 0 ? 0 : roundTo2(totalPages / total),
    books_per_genre: countBy(books, (book) => book.genre),
    books_per_author: countBy(books, (book) => book.author),
  };
}

export function computeCatalogStats(products: readonly Product[]): CatalogStats {
  const total = products.length;
  const inStock = products.filter((product) => product.in_stock).length;
  const prices = products.map((product) => product.price);

  return {
    total_products: total,
    in_stock: inStock,
    out_of_stock: total - inStock,
    average_price: total === 0 ? null : roundTo2(prices.reduce((sum, price) => sum + price, 0) / total),
    min_price: total === 0 ? null : Math.min(...prices),
    max_price: total === 0 ? null : Math.max(...prices),
    categories: countBy(products, (product) => product.category),
  };
}
