import { buildToolServer } from './backend/app';
import { Catalog } from './backend/catalog';
import { config } from './config';
import { logger } from './observability/logger';

async function start() {
  logger.info('=== tool server start ===');
  const catalog = new Catalog(config.catalogDbPath);
  logger.info('catalog ready', { path: config.catalogDbPath, products: catalog.list().length });

  const server = buildToolServer({ catalog, logger: true });
  server.addHook('onClose', async () => {
    catalog.close();
  });

  const shutdown = () => {
    server.close().catch((err) => logger.error('tool server shutdown failed', err));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.listen({ port: config.toolServerPort, host: config.toolServerHost });
  logger.info('tool server listening', { port: config.toolServerPort, host: config.toolServerHost });
}

start().catch((err) => {
  logger.error('failed to start tool server', err);
  process.exit(1);
});
