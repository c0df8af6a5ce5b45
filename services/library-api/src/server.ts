import type { Server } from 'http';
import type Koa from 'koa';

/**
 * Start `app` and resolve once it accepts connections. Rejects when the
 * server cannot bind (port in use, no permission).
 */
export function listen(app: Koa, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}
