import type {
  AuthorMatchMode,
  Book,
  BookCriteria,
  LibraryStats,
  PageRequest,
} from '@library/shared';
import type { BookStore } from '../store';
import { filterBooks } from '../query/filter';
import { paginate } from '../query/pagination';
import { computeLibraryStats } from '../query/stats';

export interface BookServiceOptions {
  /** Author matching used when a request does not choose one */
  authorMatch?: AuthorMatchMode;
}

export type AuthorSearchCriteria = Pick<BookCriteria, 'genre' | 'available'>;

/**
 * Book operations over an injected store. Every read works on a fresh
 * snapshot of the store; nothing here keeps its own copy of a book.
 */
export class BookService {
  private readonly authorMatch: AuthorMatchMode;

  constructor(private readonly store: BookStore, options: BookServiceOptions = {}) {
    this.authorMatch = options.authorMatch ?? 'substring';
  }

  get count(): number {
    return this.store.size;
  }

  listBooks(criteria: BookCriteria = {}, page?: PageRequest): Book[] {
    const filtered = filterBooks(this.store.list(), this.withAuthorMatch(criteria));
    return page ? paginate(filtered, page.skip, page.limit) : filtered;
  }

  getBook(id: number): Book {
    return this.store.get(id);
  }

  createBook(data: unknown): Book {
    return this.store.create(data);
  }

  updateBook(id: number, data: unknown): Book {
    return this.store.update(id, data);
  }

  deleteBook(id: number): Book {
    return this.store.delete(id);
  }

  /**
   * Books whose author matches `author`, using the same rule as the
   * `author` filter on listBooks.
   */
  searchByAuthor(author: string, criteria: AuthorSearchCriteria = {}): Book[] {
    return this.listBooks({ ...criteria, author });
  }

  getStats(): LibraryStats {
    return computeLibraryStats(this.store.list());
  }

  private withAuthorMatch(criteria: BookCriteria): BookCriteria {
    return { ...criteria, authorMatch: criteria.authorMatch ?? this.authorMatch };
  }
}
