import Router from 'koa-router';
import type { DeleteBookResponse } from '@library/shared';
import { BookService } from '../services/bookService';
import { parseBookListQuery, parseId } from './params';

export interface BookRouterOptions {
  defaultPageLimit: number;
}

export function createBookRouter(bookService: BookService, options: BookRouterOptions): Router {
  const router = new Router({ prefix: '/books' });

  router.get('/', async (ctx) => {
    const { criteria, page } = parseBookListQuery(ctx.query, options.defaultPageLimit);
    ctx.body = bookService.listBooks(criteria, page);
  });

  router.get('/:id', async (ctx) => {
    ctx.body = bookService.getBook(parseId(ctx.params.id));
  });

  router.post('/', async (ctx) => {
    const book = bookService.createBook(ctx.request.body);
    ctx.status = 201;
    ctx.body = book;
  });

  // PUT and PATCH both merge: only the fields sent are changed
  const updateBook: Router.IMiddleware = async (ctx) => {
    ctx.body = bookService.updateBook(parseId(ctx.params.id), ctx.request.body);
  };
  router.put('/:id', updateBook);
  router.patch('/:id', updateBook);

  router.delete('/:id', async (ctx) => {
    const deleted = bookService.deleteBook(parseId(ctx.params.id));
    const response: DeleteBookResponse = {
      message: 'Book deleted successfully',
      deleted_book: deleted,
    };
    ctx.body = response;
  });

  return router;
}
