import fs from 'fs';
import { once } from 'events';
import type { Writable } from 'stream';
import { eq, sql } from 'drizzle-orm';
import { schema, type Executor } from '../db/index.js';
import { SETTINGS } from '../config.js';
import type { PlayerLevelExportRow } from '../types.js';
import { rowidOf } from './store.js';

const { playerLevels, levels, levelPrizes, prizes } = schema;

export const EXPORT_HEADER = ['player_id', 'level_title', 'completed', 'prize_title'] as const;

/** Receives CSV text; a returned promise is awaited before the next batch. */
export type CsvSink = (chunk: string) => void | Promise<void>;

export interface ExportOptions {
  batchSize?: number;
}

// Only the first prize by attachment order is reported, even when a level awards several.
const firstPrizeTitle = sql<string | null>`(
  SELECT ${prizes.title} FROM ${levelPrizes}
  INNER JOIN ${prizes} ON ${prizes.id} = ${levelPrizes.prizeId}
  WHERE ${levelPrizes.levelId} = ${playerLevels.levelId}
  ORDER BY ${rowidOf(levelPrizes)}
  LIMIT 1
)`;

/**
 * Yields player-level rows joined to their level and first prize, one batch
 * per query, in player_levels insertion order.
 */
export function* scanExportBatches(
  db: Executor,
  batchSize: number = SETTINGS.EXPORT_BATCH_SIZE,
): Generator<PlayerLevelExportRow[], void, undefined> {
  let after = 0;
  for (;;) {
    const page = db
      .select({
        rowid: rowidOf(playerLevels),
        playerId: playerLevels.playerId,
        levelTitle: levels.title,
        completed: playerLevels.completed,
        prizeTitle: firstPrizeTitle,
      })
      .from(playerLevels)
      .innerJoin(levels, eq(levels.id, playerLevels.levelId))
      .where(sql`${rowidOf(playerLevels)} > ${after}`)
      .orderBy(rowidOf(playerLevels))
      .limit(batchSize)
      .all();

    if (page.length === 0) return;
    after = page[page.length - 1].rowid;

    yield page.map((row) => ({
      playerId: row.playerId,
      levelTitle: row.levelTitle,
      completed: row.completed !== null,
      prizeTitle: row.prizeTitle ?? '',
    }));

    if (page.length < batchSize) return;
  }
}

// ─── CSV ───

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(csvField).join(',') + '\r\n';
}

export function formatExportRow(row: PlayerLevelExportRow): string {
  return formatCsvRow([row.playerId, row.levelTitle, String(row.completed), row.prizeTitle]);
}

/** Streams the player-level report into `sink`. Returns the number of data rows. */
export async function exportPlayerLevels(db: Executor, sink: CsvSink, options: ExportOptions = {}): Promise<number> {
  let rows = 0;
  await sink(formatCsvRow(EXPORT_HEADER));
  for (const batch of scanExportBatches(db, options.batchSize)) {
    await sink(batch.map(formatExportRow).join(''));
    rows += batch.length;
  }
  return rows;
}

export function writableSink(stream: Writable): CsvSink {
  return async (chunk) => {
    if (!stream.write(chunk)) {
      await once(stream, 'drain');
    }
  };
}

export async function exportPlayerLevelsToFile(
  db: Executor,
  filePath: string,
  options: ExportOptions = {},
): Promise<number> {
  const out = fs.createWriteStream(filePath, { encoding: 'utf-8' });
  try {
    const rows = await exportPlayerLevels(db, writableSink(out), options);
    out.end();
    await once(out, 'finish');
    console.log(`[Export] Wrote ${rows} row(s) to ${filePath}`);
    return rows;
  } catch (err) {
    out.destroy();
    throw err;
  }
}
