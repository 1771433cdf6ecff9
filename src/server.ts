/**
 * HTTP server entrypoint for the delegation gateway.
 *
 * This file:
 * - Builds runtime dependencies (registry, resilience chain, router)
 * - Creates the Express app
 * - Starts listening on the configured port
 * - Drains agent connections on SIGTERM / SIGINT
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
    'Delegation gateway started',
  );
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down gracefully...');

  // Stop accepting connections while in-flight delegations drain.
  const serverClosed = new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  await Promise.all([serverClosed, deps.shutdown()]);
  logger.info('HTTP server closed, agent connections released');
}

function onSignal(signal: string): void {
  shutdown(signal).then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    },
  );
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
