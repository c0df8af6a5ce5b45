import { Context, Next } from 'koa';
import { componentLogger } from '../logger';

const log = componentLogger('http');

function errorMessageOf(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const { error } = body;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

/**
 * Structured access log: method, path, status, duration.
 * Mounted outside errorHandler, so it sees the status errorHandler settled on.
 */
export async function httpLogger(ctx: Context, next: Next): Promise<void> {
  const start = Date.now();

  await next();

  // Server errors were already logged by errorHandler, with the stack
  if (ctx.status >= 500) {
    return;
  }

  const success = ctx.status < 400;
  const logContext = {
    method: ctx.method,
    path: ctx.path,
    status: ctx.status,
    duration: Date.now() - start,
    success,
    ...(ctx.method === 'GET' && Object.keys(ctx.query).length > 0 && { query: ctx.query }),
    ...(!success && { error: errorMessageOf(ctx.body) }),
  };

  if (success) {
    log.info(logContext, 'HTTP request completed');
  } else {
    log.warn(logContext, 'HTTP request completed with client error');
  }
}
