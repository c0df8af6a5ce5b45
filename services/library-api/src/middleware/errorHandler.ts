import { Context, Next } from 'koa';
import type { ErrorResponse } from '@library/shared';
import { LibraryError, ValidationError } from '../errors';
import { componentLogger } from '../logger';

const log = componentLogger('http');

// Errors raised by koa-bodyparser and other Koa middleware (http-errors) carry a status
function statusOf(err: unknown): number {
  if (err instanceof LibraryError) {
    return err.status;
  }
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export async function errorHandler(ctx: Context, next: Next): Promise<void> {
  try {
    await next();
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    const status = statusOf(err);

    const body: ErrorResponse = {
      error: {
        message: status >= 500 ? 'Internal server error' : error.message,
        status,
        ...(err instanceof LibraryError && { code: err.code }),
        ...(err instanceof ValidationError && { details: err.issues }),
      },
    };
    ctx.status = status;
    ctx.body = body;

    if (status >= 500) {
      // Stack goes to the log, never to the client
      log.error(
        {
          error: {
            message: error.message,
            stack: error.stack,
            name: error.name,
          },
          path: ctx.path,
          method: ctx.method,
          status,
        },
        'Internal server error'
      );
    }
  }
}
