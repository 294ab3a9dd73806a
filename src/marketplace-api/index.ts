import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { EscrowCustodian } from '@core/escrow';
import { Marketplace } from '@core/marketplace';
import { InMemoryStore } from '@core/store';
import type { MarketplaceStore } from '@core/store';
import { createDatabase } from '@db/connection';
import { PgMarketplaceStore } from '@db/pg-store';
import { config, DEV_ESCROW_SECRET } from './config';
import { createApp } from './app';

function buildStore(): MarketplaceStore {
  if (config.store.driver === 'postgres') {
    const { db, pool } = createDatabase(config.database.url);
    return new PgMarketplaceStore(db, pool);
  }
  return new InMemoryStore();
}

async function start() {
  if (config.isProd && config.escrow.secret === DEV_ESCROW_SECRET) {
    throw new Error('ESCROW_SECRET must be set in production');
  }

  const store = buildStore();
  console.warn(`[STORE] Using ${config.store.driver} store`);

  const marketplace = new Marketplace({
    store,
    custodian: new EscrowCustodian(config.escrow.secret),
  });
  const app = createApp({
    marketplace,
    clientUrl: config.clientUrl,
    faucetEnabled: config.faucetEnabled,
  });
  const server = createServer(app);

  function shutdown(signal: string) {
    console.warn(`[SERVER] ${signal} received, shutting down`);
    server.close(() => {
      (store.close?.() ?? Promise.resolve()).then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('[STORE] Failed to close:', err);
          process.exit(1);
        },
      );
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] Escrow Marketplace API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
    if (config.faucetEnabled) {
      console.warn('[SERVER] Faucet enabled: POST /accounts/:identity/deposit');
    }
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
