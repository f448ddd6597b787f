import { v4 as uuid } from 'uuid';
import { eq, and, asc, sql, count, getTableColumns } from 'drizzle-orm';
import type { SQLiteTable } from 'drizzle-orm/sqlite-core';
import { schema, type Executor } from '../db/index.js';
import { ConstraintViolationError, NotFoundError, translateStoreError } from '../errors.js';
import { BOOST_INFO, PROGRESSION } from '../config.js';
import type {
  Boost,
  BoostType,
  Level,
  LevelPrize,
  LevelResult,
  Player,
  PlayerBoost,
  PlayerLevel,
  PlayerPrize,
  PlayerSummary,
  Prize,
} from '../types.js';

const { players, boosts, levels, prizes, levelPrizes, playerBoosts, playerLevels, playerPrizes } = schema;

export const SCAN_PAGE_SIZE = 500;

function write<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw translateStoreError(err);
  }
}

function expectRow<T>(row: T | undefined, what: string): T {
  if (row === undefined) throw new Error(`${what} returned no row`);
  return row;
}

export function assertNonNegativeInteger(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConstraintViolationError(`${field} must be a non-negative safe integer, got ${value}`);
  }
}

function assertTitle(title: string): void {
  // counted in code points, as SQLite's length() does
  if (title.trim().length === 0 || [...title].length > PROGRESSION.TITLE_MAX_LENGTH) {
    throw new ConstraintViolationError(`title must be 1-${PROGRESSION.TITLE_MAX_LENGTH} characters`);
  }
}

// ─── Insertion-order scans ───

export const rowidOf = (table: SQLiteTable) => sql<number>`${table}.rowid`;

/**
 * Walks a table in rowid order, one page per query. Each call starts a new
 * scan; nothing is held open between pages.
 */
function* paginate<T extends { rowid: number }>(
  fetchPage: (afterRowid: number) => T[],
  pageSize: number,
): Generator<Omit<T, 'rowid'>, void, undefined> {
  let after = 0;
  for (;;) {
    const page = fetchPage(after);
    for (const { rowid, ...row } of page) {
      after = rowid;
      yield row;
    }
    if (page.length < pageSize) return;
  }
}

// ─── Players ───
export function createPlayer(db: Executor, id: string = uuid()): Player {
  return write(() => expectRow(db.insert(players).values({ id }).returning().get(), 'insert player'));
}

export function getPlayer(db: Executor, playerId: string): Player | undefined {
  return db.select().from(players).where(eq(players.id, playerId)).get();
}

export function requirePlayer(db: Executor, playerId: string): Player {
  const player = getPlayer(db, playerId);
  if (!player) throw new NotFoundError('player', playerId);
  return player;
}

export function deletePlayer(db: Executor, playerId: string): boolean {
  return db.delete(players).where(eq(players.id, playerId)).run().changes > 0;
}

// ─── Boosts ───
export function createBoost(db: Executor, type: BoostType, id: string = uuid()): Boost {
  return write(() =>
    expectRow(
      db.insert(boosts).values({ id, type, description: BOOST_INFO[type].description }).returning().get(),
      'insert boost',
    ),
  );
}

export function getBoost(db: Executor, boostId: string): Boost | undefined {
  return db.select().from(boosts).where(eq(boosts.id, boostId)).get();
}

export function getBoostByType(db: Executor, type: BoostType): Boost | undefined {
  return db.select().from(boosts).where(eq(boosts.type, type)).get();
}

export function requireBoost(db: Executor, boostId: string): Boost {
  const boost = getBoost(db, boostId);
  if (!boost) throw new NotFoundError('boost', boostId);
  return boost;
}

export function listBoosts(db: Executor): Boost[] {
  return db.select().from(boosts).orderBy(rowidOf(boosts)).all();
}

export function deleteBoost(db: Executor, boostId: string): boolean {
  return db.delete(boosts).where(eq(boosts.id, boostId)).run().changes > 0;
}

// ─── Levels ───
export function createLevel(db: Executor, title: string, order = 0, id: string = uuid()): Level {
  assertTitle(title);
  if (!Number.isInteger(order)) {
    throw new ConstraintViolationError(`order must be an integer, got ${order}`);
  }
  return write(() => expectRow(db.insert(levels).values({ id, title, order }).returning().get(), 'insert level'));
}

export function getLevel(db: Executor, levelId: string): Level | undefined {
  return db.select().from(levels).where(eq(levels.id, levelId)).get();
}

export function requireLevel(db: Executor, levelId: string): Level {
  const level = getLevel(db, levelId);
  if (!level) throw new NotFoundError('level', levelId);
  return level;
}

export function listLevels(db: Executor): Level[] {
  return db.select().from(levels).orderBy(asc(levels.order), rowidOf(levels)).all();
}

export function deleteLevel(db: Executor, levelId: string): boolean {
  return db.delete(levels).where(eq(levels.id, levelId)).run().changes > 0;
}

// ─── Prizes ───
export function createPrize(db: Executor, title: string, id: string = uuid()): Prize {
  assertTitle(title);
  return write(() => expectRow(db.insert(prizes).values({ id, title }).returning().get(), 'insert prize'));
}

export function getPrize(db: Executor, prizeId: string): Prize | undefined {
  return db.select().from(prizes).where(eq(prizes.id, prizeId)).get();
}

export function requirePrize(db: Executor, prizeId: string): Prize {
  const prize = getPrize(db, prizeId);
  if (!prize) throw new NotFoundError('prize', prizeId);
  return prize;
}

export function listPrizes(db: Executor): Prize[] {
  return db.select().from(prizes).orderBy(rowidOf(prizes)).all();
}

export function deletePrize(db: Executor, prizeId: string): boolean {
  return db.delete(prizes).where(eq(prizes.id, prizeId)).run().changes > 0;
}

// ─── Level Prizes ───

/** Returns false when the prize was already attached to the level. */
export function attachPrizeToLevel(db: Executor, levelId: string, prizeId: string): boolean {
  requireLevel(db, levelId);
  requirePrize(db, prizeId);
  return write(() => db.insert(levelPrizes).values({ levelId, prizeId }).onConflictDoNothing().run().changes > 0);
}

export function scanLevelPrizes(
  db: Executor,
  levelId: string,
  pageSize = SCAN_PAGE_SIZE,
): Generator<LevelPrize, void, undefined> {
  return paginate(
    (after) =>
      db
        .select({ rowid: rowidOf(levelPrizes), ...getTableColumns(levelPrizes) })
        .from(levelPrizes)
        .where(and(eq(levelPrizes.levelId, levelId), sql`${rowidOf(levelPrizes)} > ${after}`))
        .orderBy(rowidOf(levelPrizes))
        .limit(pageSize)
        .all(),
    pageSize,
  );
}

// ─── Player Boosts ───
export function getPlayerBoost(db: Executor, playerId: string, boostId: string): PlayerBoost | undefined {
  return db
    .select()
    .from(playerBoosts)
    .where(and(eq(playerBoosts.playerId, playerId), eq(playerBoosts.boostId, boostId)))
    .get();
}

/**
 * Adds `amount` to the player's stock of a boost in one statement. The row is
 * created on first grant; `created_at` is kept from that first insert.
 */
export function accumulatePlayerBoost(
  db: Executor,
  playerId: string,
  boostId: string,
  amount: number,
  now: Date,
): PlayerBoost {
  assertNonNegativeInteger('amount', amount);
  return write(() =>
    expectRow(
      db
        .insert(playerBoosts)
        .values({ playerId, boostId, amount, createdAt: now })
        .onConflictDoUpdate({
          target: [playerBoosts.playerId, playerBoosts.boostId],
          set: { amount: sql`${playerBoosts.amount} + excluded.amount` },
        })
        .returning()
        .get(),
      'upsert player boost',
    ),
  );
}

export function scanPlayerBoosts(
  db: Executor,
  playerId: string,
  pageSize = SCAN_PAGE_SIZE,
): Generator<PlayerBoost, void, undefined> {
  return paginate(
    (after) =>
      db
        .select({ rowid: rowidOf(playerBoosts), ...getTableColumns(playerBoosts) })
        .from(playerBoosts)
        .where(and(eq(playerBoosts.playerId, playerId), sql`${rowidOf(playerBoosts)} > ${after}`))
        .orderBy(rowidOf(playerBoosts))
        .limit(pageSize)
        .all(),
    pageSize,
  );
}

// ─── Player Levels ───
export function getPlayerLevel(db: Executor, playerId: string, levelId: string): PlayerLevel | undefined {
  return db
    .select()
    .from(playerLevels)
    .where(and(eq(playerLevels.playerId, playerId), eq(playerLevels.levelId, levelId)))
    .get();
}

/** Insert or overwrite the (player, level) row. Never creates a second row. */
export function upsertPlayerLevel(
  db: Executor,
  playerId: string,
  levelId: string,
  result: LevelResult,
): PlayerLevel {
  assertNonNegativeInteger('score', result.score);
  return write(() =>
    expectRow(
      db
        .insert(playerLevels)
        .values({ playerId, levelId, completed: result.completed, score: result.score })
        .onConflictDoUpdate({
          target: [playerLevels.playerId, playerLevels.levelId],
          set: { completed: result.completed, score: result.score },
        })
        .returning()
        .get(),
      'upsert player level',
    ),
  );
}

export function scanPlayerLevels(
  db: Executor,
  playerId: string,
  pageSize = SCAN_PAGE_SIZE,
): Generator<PlayerLevel, void, undefined> {
  return paginate(
    (after) =>
      db
        .select({ rowid: rowidOf(playerLevels), ...getTableColumns(playerLevels) })
        .from(playerLevels)
        .where(and(eq(playerLevels.playerId, playerId), sql`${rowidOf(playerLevels)} > ${after}`))
        .orderBy(rowidOf(playerLevels))
        .limit(pageSize)
        .all(),
    pageSize,
  );
}

export function countPlayerLevels(db: Executor): number {
  const row = db.select({ total: count() }).from(playerLevels).get();
  return row ? row.total : 0;
}

// ─── Player Prizes ───
export function getPlayerPrize(db: Executor, playerId: string, prizeId: string): PlayerPrize | undefined {
  return db
    .select()
    .from(playerPrizes)
    .where(and(eq(playerPrizes.playerId, playerId), eq(playerPrizes.prizeId, prizeId)))
    .get();
}

/** Records the grant unless the player already holds the prize. */
export function insertPlayerPrizeIfAbsent(
  db: Executor,
  playerId: string,
  prizeId: string,
  now: Date,
): PlayerPrize | undefined {
  return write(() =>
    db.insert(playerPrizes).values({ playerId, prizeId, receivedAt: now }).onConflictDoNothing().returning().get(),
  );
}

export function scanPlayerPrizes(
  db: Executor,
  playerId: string,
  pageSize = SCAN_PAGE_SIZE,
): Generator<PlayerPrize, void, undefined> {
  return paginate(
    (after) =>
      db
        .select({ rowid: rowidOf(playerPrizes), ...getTableColumns(playerPrizes) })
        .from(playerPrizes)
        .where(and(eq(playerPrizes.playerId, playerId), sql`${rowidOf(playerPrizes)} > ${after}`))
        .orderBy(rowidOf(playerPrizes))
        .limit(pageSize)
        .all(),
    pageSize,
  );
}

// ─── Summary ───
export function getPlayerSummary(db: Executor, playerId: string): PlayerSummary {
  const player = requirePlayer(db, playerId);

  const summary: PlayerSummary = { player, boosts: [], levels: [], prizes: [] };
  for (const pb of scanPlayerBoosts(db, playerId)) {
    summary.boosts.push({ ...pb, type: requireBoost(db, pb.boostId).type });
  }
  for (const pl of scanPlayerLevels(db, playerId)) {
    summary.levels.push({ ...pl, title: requireLevel(db, pl.levelId).title });
  }
  for (const pp of scanPlayerPrizes(db, playerId)) {
    summary.prizes.push({ ...pp, title: requirePrize(db, pp.prizeId).title });
  }
  return summary;
}
