import type { CatalogStats, PageRequest, Product, ProductCriteria } from '@library/shared';
import type { ProductStore } from '../store';
import { filterProducts } from '../query/filter';
import { paginate } from '../query/pagination';
import { computeCatalogStats } from '../query/stats';

export type CategorySearchCriteria = Pick<ProductCriteria, 'minPrice' | 'maxPrice' | 'inStock'>;

export class ProductService {
  constructor(private readonly store: ProductStore) {}

  listProducts(criteria: ProductCriteria = {}, page?: PageRequest): Product[] {
    const filtered = filterProducts(this.store.list(), criteria);
    return page ? paginate(filtered, page.skip, page.limit) : filtered;
  }

  getProduct(id: number): Product {
    return this.store.get(id);
  }

  createProduct(data: unknown): Product {
    return this.store.create(data);
  }

  updateProduct(id: number, data: unknown): Product {
    return this.store.update(id, data);
  }

  deleteProduct(id: number): Product {
    return this.store.delete(id);
  }

  // Category search lists in-stock products unless told otherwise
  searchByCategory(category: string, criteria: CategorySearchCriteria = {}): Product[] {
    return this.listProducts({ ...criteria, category, inStock: criteria.inStock ?? true });
  }

  getStats(): CatalogStats {
    return computeCatalogStats(this.store.list());
  }
}
