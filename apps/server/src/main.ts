import { createResolverContext, loadAbbreviationTable } from '@time-banner/core';
import { createApp } from './app.js';
import { loadServerConfig } from './config.js';
import { listen } from './listen.js';
import { createLogger, logLevelFor } from './logger.js';

async function main(): Promise<void> {
  const config = loadServerConfig();
  const logger = createLogger('server', logLevelFor(config.env));

  const abbreviations = await loadAbbreviationTable({
    sourcePath: config.abbreviationsPath,
    precedencePath: config.precedencePath,
  });
  logger.debug(`Loaded ${abbreviations.size} timezone abbreviations`);

  const context = createResolverContext({ abbreviations, config: config.resolver });
  const app = createApp({ context, logger });

  const server = await listen(app, config.port, config.host);
  logger.info(`Starting ${config.env} on ${config.host}:${config.port}`);

  server.on('error', (error) => {
    logger.error('Server error', error);
    process.exitCode = 1;
  });
}

main().catch((error: unknown) => {
  console.error('[server] Failed to start', error);
  process.exitCode = 1;
});
