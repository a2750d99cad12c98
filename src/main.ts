/**
 * Service entry point.
 *
 * Configuration comes from the environment, with `.env` next to the working
 * directory filling gaps (see src/config.ts for the variables). Run with:
 *
 *     npm start
 */

import { loadConfig } from './config.js';
import { createAppContext, resolveBackend } from './context.js';
import { createApp } from './http.js';
import { createConsoleLogger, describeError } from './logger.js';

async function main(): Promise<void> {
  const config = loadConfig({ envFile: '.env' });
  const logger = createConsoleLogger(config.logLevel);

  const backend = await resolveBackend(config, logger);
  const context = createAppContext({ config, backend, logger });
  const app = createApp(context.service, logger);

  const server = app.listen(config.port, () => {
    logger.info(`Server running at http://localhost:${config.port} (cache: ${backend.kind})`);
  });

  let shuttingDown = false;
  function shutdown(signal: string): void {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);
    context.close();
    server.close((error) => {
      if (error) {
        logger.error(`Error while closing server: ${describeError(error)}`);
        process.exitCode = 1;
      }
    });
  }

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
