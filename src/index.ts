import { config } from './config.js';
import { logger } from './lib/logger.js';
import { createServer } from './api/server.js';
import { registerShutdownHandlers } from './lib/shutdown.js';
import { ItemStore } from './items/store.js';
import { DEFAULT_SEED_ITEMS } from './items/item.types.js';

async function main() {
  logger.info(
    { service: config.SERVICE_NAME, version: config.SERVICE_VERSION, debug: config.DEBUG },
    'Starting items API...'
  );

  // 1. Volatile store, seeded with the demo items
  const store = new ItemStore({ seed: DEFAULT_SEED_ITEMS });

  // 2. Create and configure the HTTP server
  const app = await createServer({ store });

  // 3. Start HTTP server
  try {
    await app.listen({
      port: config.PORT,
      host: config.LISTEN_HOST,
    });
    logger.info(
      { port: config.PORT, host: config.LISTEN_HOST },
      'Items API server started'
    );
  } catch (err) {
    logger.fatal({ err }, 'Failed to start HTTP server');
    process.exit(1);
  }

  // 4. Register graceful shutdown handlers
  registerShutdownHandlers({ server: app });
}

// Handle unhandled rejections
process.on('unhandledRejection', (err) => {
  logger.error({ err }, 'Unhandled promise rejection');
});

// Handle uncaught exceptions
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception - shutting down');
  process.exit(1);
});

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start application');
  process.exit(1);
});
