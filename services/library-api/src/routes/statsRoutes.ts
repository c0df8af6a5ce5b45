import Router from 'koa-router';
import type { HealthCheckResponse, RootResponse } from '@library/shared';
import { BookService } from '../services/bookService';

export function createStatsRouter(bookService: BookService): Router {
  const router = new Router();

  router.get('/', async (ctx) => {
    const response: RootResponse = {
      message: 'Welcome to the Library Management API',
      docs: '/books',
      total_books: bookService.count,
    };
    ctx.body = response;
  });

  router.get('/health', async (ctx) => {
    const response: HealthCheckResponse = { status: 'ok', service: 'library-api' };
    ctx.body = response;
  });

  router.get('/stats', async (ctx) => {
    ctx.body = bookService.getStats();
  });

  return router;
}
