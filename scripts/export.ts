import { openDatabase } from '../src/db/index.js';
import { SETTINGS } from '../src/config.js';
import { exportPlayerLevelsToFile } from '../src/engine/export.js';

const target = process.argv[2] || SETTINGS.EXPORT_PATH;
const { sqlite, db } = openDatabase(SETTINGS.DB_PATH);

try {
  const rows = await exportPlayerLevelsToFile(db, target, { batchSize: SETTINGS.EXPORT_BATCH_SIZE });
  console.log(`✅ Exported ${rows} rows from ${SETTINGS.DB_PATH} to ${target}`);
} finally {
  sqlite.close();
}
