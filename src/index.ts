import { serve } from '@hono/node-server';
import { openDatabase } from './db/index.js';
import { SETTINGS } from './config.js';
import { bootstrapCatalog } from './engine/seed.js';
import { createApp } from './app.js';

// ─── Initialize ───
console.log('🎮 Initializing progression ledger...');
const { sqlite, db } = openDatabase(SETTINGS.DB_PATH);
const boosts = bootstrapCatalog(db);
console.log(`[DB] ${SETTINGS.DB_PATH} ready, ${Object.keys(boosts).length} boost(s) in catalog`);

const app = createApp(db);

// ─── Start ───
const server = serve({ fetch: app.fetch, port: SETTINGS.PORT }, (info) => {
  console.log(`\n🏆 Progression ledger is live at http://localhost:${info.port}\n`);
});

function shutdown() {
  server.close(() => {
    sqlite.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export default app;
