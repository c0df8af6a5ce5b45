import Router from 'koa-router';
import { BookService } from '../services/bookService';
import { ProductService } from '../services/productService';
import { parseAuthorSearchQuery, parseCategorySearchQuery } from './params';

export function createSearchRouter(bookService: BookService, productService: ProductService): Router {
  const router = new Router();

  // Books by author, optionally narrowed by genre and availability
  router.get('/search/:author/books', async (ctx) => {
    const criteria = parseAuthorSearchQuery(ctx.query);
    ctx.body = bookService.searchByAuthor(ctx.params.author, criteria);
  });

  // Products in a category, in stock unless in_stock=false
  router.get('/categories/:category/products', async (ctx) => {
    const criteria = parseCategorySearchQuery(ctx.query);
    ctx.body = productService.searchByCategory(ctx.params.category, criteria);
  });

  return router;
}
