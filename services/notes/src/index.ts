import { config } from './config';
import { buildApp, connectStore } from './server';
import { createKeyValueStore } from './storage';

/**
 * Entrypoint for the notes service.
 * Connects the configured store, registers routes, and listens on configured host/port.
 */
async function main() {
  const kv = createKeyValueStore(config.store.backend, config.store.redisUrl);
  const app = await buildApp({ kv, logger: { level: config.logLevel } });

  try {
    await connectStore(kv, app.log, config.store.timeoutMs);
    app.log.info({ backend: config.store.backend }, 'store reachable');
  } catch (err) {
    app.log.error({ err }, 'Cannot reach store');
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down');
    try {
      await app.close();
      await kv.close();
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`notes service (${config.store.backend} store) listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting notes service:', err);
  process.exit(1);
});
