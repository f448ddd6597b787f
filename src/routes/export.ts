import { Hono } from 'hono';
import { stream } from 'hono/streaming';
import type { ProgressionDb } from '../db/index.js';
import { SETTINGS } from '../config.js';
import { exportPlayerLevels } from '../engine/export.js';

export function exportRoutes(db: ProgressionDb) {
  const exports = new Hono();

  // GET /export.csv: Player levels report
  exports.get('/export.csv', (c) => {
    c.header('Content-Type', 'text/csv; charset=utf-8');
    c.header('Content-Disposition', 'attachment; filename="player_levels_export.csv"');
    return stream(c, async (out) => {
      const rows = await exportPlayerLevels(
        db,
        async (chunk) => {
          await out.write(chunk);
        },
        { batchSize: SETTINGS.EXPORT_BATCH_SIZE },
      );
      console.log(`[Export] Streamed ${rows} row(s)`);
    }, async (err) => {
      console.error('[Export] Stream failed:', err.message);
    });
  });

  return exports;
}
