import { config, validateConfig } from './config.js';
import { loadCatalogOrExit } from './activities/catalog.js';
import { ActivityRegistry } from './activities/registry.js';
import { createActivitiesServer } from './server/app.js';

validateConfig();

const registry = new ActivityRegistry(loadCatalogOrExit(config.CATALOG_FILE));
const server = createActivitiesServer(registry, {
  staticDir: config.STATIC_DIR,
  logRequests: config.LOG_REQUESTS,
});

server.listen(config.PORT, config.HOST, () => {
  console.log(`
  ╔══════════════════════════════════════════════╗
  ║  Mergington High School Activities           ║
  ║  http://${config.HOST}:${config.PORT}
  ║                                              ║
  ║  Activities loaded: ${registry.size}
  ║  Catalog: ${config.CATALOG_FILE}
  ╚══════════════════════════════════════════════╝
  `);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close(err => {
    if (err) {
      console.error('[Server] Error during shutdown:', err);
      process.exit(1);
    }
    process.exit(0);
  });
  server.closeIdleConnections();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
