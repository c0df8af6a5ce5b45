import Koa from 'koa';
import bodyParser from 'koa-bodyparser';
import cors from '@koa/cors';
import { errorHandler } from './middleware/errorHandler';
import { httpLogger } from './middleware/httpLogger';
import { createBookRouter } from './routes/bookRoutes';
import { createProductRouter } from './routes/productRoutes';
import { createSearchRouter } from './routes/searchRoutes';
import { createStatsRouter } from './routes/statsRoutes';
import { BookService } from './services/bookService';
import { ProductService } from './services/productService';
import type { BookStore, ProductStore } from './store';
import type { AuthorMatchMode } from '@library/shared';

export interface AppDependencies {
  bookStore: BookStore;
  productStore: ProductStore;
  authorMatch?: AuthorMatchMode;
  defaultPageLimit?: number;
}

export function createApp(deps: AppDependencies): Koa {
  const app = new Koa();

  const bookService = new BookService(deps.bookStore, { authorMatch: deps.authorMatch });
  const productService = new ProductService(deps.productStore);
  const pageOptions = { defaultPageLimit: deps.defaultPageLimit ?? 10 };

  const routers = [
    createStatsRouter(bookService),
    createBookRouter(bookService, pageOptions),
    createProductRouter(productService, pageOptions),
    createSearchRouter(bookService, productService),
  ];

  // Middleware
  app.use(httpLogger);
  app.use(errorHandler);
  app.use(cors());
  app.use(bodyParser());

  // Routes
  for (const router of routers) {
    app.use(router.routes()).use(router.allowedMethods());
  }

  return app;
}
