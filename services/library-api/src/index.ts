import { createApp } from './app';
import { config } from './config';
import { loadFromFile } from './loader';
import { logger } from './logger';
import { listen } from './server';
import { createBookStore, createProductStore } from './store';

async function main() {
  // Stores live for the lifetime of the process
  const bookStore = createBookStore();
  const productStore = createProductStore();

  await loadFromFile(bookStore, config.seed.booksFile);
  await loadFromFile(productStore, config.seed.productsFile);

  const app = createApp({
    bookStore,
    productStore,
    authorMatch: config.query.authorMatch,
    defaultPageLimit: config.query.defaultPageLimit,
  });

  // A bind failure (port in use) rejects and ends up in the catch below
  await listen(app, config.port);
  logger.info(
    { port: config.port, books: bookStore.size, products: productStore.size },
    'Library API started successfully'
  );
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start Library API');
  process.exit(1);
});
