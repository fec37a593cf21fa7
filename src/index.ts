/**
 * AMM service: Entry Point & Composition Root
 * Wires together all dependencies and starts the server.
 */
import { createServer } from 'http';
import { env } from './config/env.js';
import { getLogger } from './config/logger.js';

// Infrastructure
import { InMemoryPoolStore } from './infrastructure/store/InMemoryPoolStore.js';
import { InMemoryAssetLedger } from './infrastructure/ledger/InMemoryAssetLedger.js';
import { LoggingNotificationSink } from './infrastructure/notifications/LoggingNotificationSink.js';
import { FanOutNotificationSink } from './infrastructure/notifications/FanOutNotificationSink.js';

// Application
import { AmmCore } from './application/AmmCore.js';

// Interface
import { createApp } from './interface/http/app.js';
import { WsServer } from './interface/ws/WsServer.js';

const logger = getLogger();

function main(): void {
  logger.info(
    { env: env.NODE_ENV, port: env.PORT, feeBps: env.AMM_FEE_BPS },
    'Starting AMM service',
  );

  // ──────────────────────────────────────────────
  // 1. Infrastructure Layer
  // ──────────────────────────────────────────────
  const store = new InMemoryPoolStore();
  const ledger = new InMemoryAssetLedger(env.AMM_CUSTODY_ACCOUNT);
  const wsServer = new WsServer();

  // ──────────────────────────────────────────────
  // 2. Application Layer
  // ──────────────────────────────────────────────
  const amm = new AmmCore({
    store,
    transfers: ledger,
    notifications: new FanOutNotificationSink(new LoggingNotificationSink(), wsServer),
    feeBps: env.AMM_FEE_BPS,
  });

  // ──────────────────────────────────────────────
  // 3. Interface Layer
  // ──────────────────────────────────────────────
  const app = createApp({ amm, ledger });
  const server = createServer(app);
  wsServer.attach(server);

  server.listen(env.PORT, env.HOST, () => {
    logger.info({ host: env.HOST, port: env.PORT }, 'HTTP server listening');
  });

  // ──────────────────────────────────────────────
  // 4. Graceful Shutdown
  // ──────────────────────────────────────────────
  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    wsServer.close();
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error while closing HTTP server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
}
