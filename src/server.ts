// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Process Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

import { createApp } from './app.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './logging/index.js';
import { initializeStore } from './storage/index.js';

const logger = getLogger({ component: 'server' });

function main(): void {
  const config = loadConfig();
  const store = initializeStore(config);
  const app = createApp({ store, config });

  const { host, port } = config.server;
  const server = app.listen(port, host, () => {
    logger.info('IMAGINE API listening', {
      host,
      port,
      environment: config.env.environment,
      storage: store.isAvailable ? 'mongodb' : 'none',
    });
  });

  server.on('error', (error) => {
    logger.fatal('HTTP server failed', error, { host, port });
    process.exit(1);
  });
}

main();
