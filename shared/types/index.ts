// Author Matching
export type AuthorMatchMode = 'substring' | 'exact';

// Records
export interface Book {
  id: number;
  title: string;
  author: string;
  isbn: string;
  published_year: number;
  pages: number;
  available: boolean;
  genre: string;
  summary: string | null;
  added_at: string;
}

export interface Product {
  id: number;
  name: string;
  price: number;
  category: string;
  in_stock: boolean;
  description: string | null;
  created_at: string;
}

// Inputs
export interface BookInput {
  title: string;
  author: string;
  isbn: string;
  published_year: number;
  pages: number;
  available: boolean;
  genre: string;
  summary?: string | null;
}

// Only the keys present are applied; `summary: null` clears the summary.
export type BookPatch = Partial<BookInput>;

export interface ProductInput {
  name: string;
  price: number;
  category: string;
  in_stock: boolean;
  description?: string | null;
}

export type ProductPatch = Partial<ProductInput>;

// Query Criteria
export interface BookCriteria {
  genre?: string;
  author?: string;
  available?: boolean;
  minPages?: number;
  maxPages?: number;
  authorMatch?: AuthorMatchMode;
}

export interface ProductCriteria {
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  inStock?: boolean;
}

export interface PageRequest {
  skip: number;
  limit: number;
}

// Statistics
export interface LibraryStats {
  total_books: number;
  available_books: number;
  borrowed_books: number;
  total_pages: number;
  average_pages: number;
  books_per_genre: Record<string, number>;
  books_per_author: Record<string, number>;
}

export interface CatalogStats {
  total_products: number;
  in_stock: number;
  out_of_stock: number;
  average_price: number | null;
  min_price: number | null;
  max_price: number | null;
  categories: Record<string, number>;
}

// API Request/Response Types
export interface RootResponse {
  message: string;
  docs: string;
  total_books: number;
}

export interface HealthCheckResponse {
  status: 'ok';
  service: string;
}

export interface DeleteBookResponse {
  message: string;
  deleted_book: Book;
}

export interface DeleteProductResponse {
  message: string;
  deleted_product: Product;
}

export interface FieldIssue {
  field: string;
  message: string;
}

export interface ErrorResponse {
  error: {
    message: string;
    status: number;
    code?: string;
    details?: FieldIssue[];
  };
}
