import { createApp } from './app';
import { loadConfig, prepareCacheStorage } from './config';
import { errorMessage, logger } from './helpers/logger';
import { ShareExtractor } from './services/extractor';
import { ResponseCache } from './services/responseCache';

const log = logger.child('server');

function main(): void {
  const config = loadConfig();

  prepareCacheStorage(config.cache);
  const cache = config.cache.enabled ? ResponseCache.open(config.cache) : null;

  const extractor = new ShareExtractor(config, { cache });
  const app = createApp({ config, extractor, cache });

  const server = app.listen(config.port, () => {
    log.info('Listening', {
      port: config.port,
      cache: config.cache.enabled ? config.cache.dbPath : 'disabled',
      maxRetries: config.transport.maxRetries,
    });
  });

  let shuttingDown = false;

  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down', { signal });

    const timer = setTimeout(() => {
      log.error('Shutdown timed out, forcing exit', { timeoutMs: config.shutdownTimeoutMs });
      process.exit(1);
    }, config.shutdownTimeoutMs);
    timer.unref();

    server.close(err => {
      if (err) log.error('Error closing server', { error: err.message });
      cache?.close();
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (err) {
  log.error('Failed to start', { error: errorMessage(err) });
  process.exit(1);
}
