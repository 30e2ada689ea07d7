import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { GameRegistry, GameService } from './game/index.js';
import { createLogger } from './logger.js';
import { combineWordLists, loadWordLists } from './wordlists.js';

const main = async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const wordLists = await loadWordLists(config.wordlistDir);
  const vocabulary = combineWordLists(wordLists);
  logger.info({ lists: [...wordLists.keys()], words: vocabulary.length }, 'vocabulary loaded');

  const registry = new GameRegistry({
    vocabulary,
    logger,
    playerIdleMs: config.playerIdleMs,
    gameRetentionMs: config.gameRetentionMs
  });
  const service = new GameService(registry, { pollTimeoutMs: config.pollTimeoutMs, logger });
  registry.startSweeping(config.sweepIntervalMs);

  const httpServer = createServer(createApp({ service, logger, corsOrigin: config.corsOrigin }));

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    registry
      .close()
      .then(() => {
        httpServer.close(() => process.exit(0));
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  httpServer.listen(config.port, () => {
    logger.info({ port: config.port }, `Game API listening on http://localhost:${config.port}`);
  });
};

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
