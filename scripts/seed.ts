import { openDatabase } from '../src/db/index.js';
import { SETTINGS } from '../src/config.js';
import { seedExampleData } from '../src/engine/seed.js';
import { getPlayerSummary } from '../src/engine/store.js';
import { exportPlayerLevelsToFile } from '../src/engine/export.js';

const { sqlite, db } = openDatabase(SETTINGS.DB_PATH);

console.log(`🎮 Seeding ${SETTINGS.SEED_PLAYERS} players x ${SETTINGS.SEED_LEVELS} levels into ${SETTINGS.DB_PATH}\n`);
const started = Date.now();
const seeded = seedExampleData(db, { players: SETTINGS.SEED_PLAYERS, levels: SETTINGS.SEED_LEVELS });
console.log(`Seeded in ${((Date.now() - started) / 1000).toFixed(1)}s\n`);

// ─── Example player report ───
const [firstPlayerId] = seeded.playerIds;
if (firstPlayerId) {
  const summary = getPlayerSummary(db, firstPlayerId);
  console.log(`Player points: ${summary.player.points}`);

  console.log('Boosts:');
  for (const pb of summary.boosts) {
    console.log(`- ${pb.type}, amount: ${pb.amount}`);
  }

  console.log('\nLevels (first 10):');
  for (const pl of summary.levels.slice(0, 10)) {
    console.log(`- ${pl.title}, score: ${pl.score}, completed: ${pl.completed ? pl.completed.toISOString() : 'no'}`);
  }

  console.log('\nPrizes:');
  for (const pp of summary.prizes) {
    console.log(`- ${pp.title}, received_at: ${pp.receivedAt.toISOString()}`);
  }
}

// ─── CSV export ───
const rows = await exportPlayerLevelsToFile(db, SETTINGS.EXPORT_PATH, { batchSize: SETTINGS.EXPORT_BATCH_SIZE });
console.log(`\n✅ Exported ${rows} rows to ${SETTINGS.EXPORT_PATH}`);

sqlite.close();
