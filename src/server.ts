/**
 * HTTP server entrypoint for the invoice reply service.
 *
 * This file:
 * - Loads configuration
 * - Builds runtime dependencies and the Express app
 * - Starts listening on the configured port
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

const deps = buildRuntimeDeps();
const app = createApp(deps);
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
    },
    'Invoice reply service started',
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down gracefully...');
  server.close(() => {
    deps
      .shutdown()
      .then(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
