import Router from 'koa-router';
import type { DeleteProductResponse } from '@library/shared';
import { ProductService } from '../services/productService';
import { parseId, parseProductListQuery } from './params';

export interface ProductRouterOptions {
  defaultPageLimit: number;
}

export function createProductRouter(
  productService: ProductService,
  options: ProductRouterOptions
): Router {
  const router = new Router({ prefix: '/products' });

  router.get('/', async (ctx) => {
    const { criteria, page } = parseProductListQuery(ctx.query, options.defaultPageLimit);
    ctx.body = productService.listProducts(criteria, page);
  });

  // Registered before /:id so "stats" is not read as an id
  router.get('/stats', async (ctx) => {
    ctx.body = productService.getStats();
  });

  router.get('/:id', async (ctx) => {
    ctx.body = productService.getProduct(parseId(ctx.params.id));
  });

  router.post('/', async (ctx) => {
    const product = productService.createProduct(ctx.request.body);
    ctx.status = 201;
    ctx.body = product;
  });

  const updateProduct: Router.IMiddleware = async (ctx) => {
    ctx.body = productService.updateProduct(parseId(ctx.params.id), ctx.request.body);
  };
  router.put('/:id', updateProduct);
  router.patch('/:id', updateProduct);

  router.delete('/:id', async (ctx) => {
    const deleted = productService.deleteProduct(parseId(ctx.params.id));
    const response: DeleteProductResponse = {
      message: 'Product deleted successfully',
      deleted_product: deleted,
    };
    ctx.body = response;
  });

  return router;
}
