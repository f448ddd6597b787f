import { eq } from 'drizzle-orm';
import { runInTransaction, schema, type ProgressionDb } from '../db/index.js';
import { PROGRESSION } from '../config.js';
import type { LevelResult, Player, PlayerBoost, PlayerLevel, PlayerPrize } from '../types.js';
import {
  accumulatePlayerBoost,
  assertNonNegativeInteger,
  getPlayerLevel,
  insertPlayerPrizeIfAbsent,
  requireBoost,
  requireLevel,
  requirePlayer,
  scanLevelPrizes,
  upsertPlayerLevel,
} from './store.js';

export interface LoginResult {
  player: Player;
  credited: boolean;
}

/** YYYY-MM-DD of the instant in UTC. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ─── Daily Login ───

/**
 * Credits the daily bonus at most once per UTC calendar day. Later logins on
 * the same day only move `last_login`.
 */
export function login(db: ProgressionDb, playerId: string, now: Date = new Date()): LoginResult {
  return runInTransaction(db, (tx) => {
    const player = requirePlayer(tx, playerId);
    const credited = !player.lastLogin || utcDay(player.lastLogin) < utcDay(now);
    // last_login never moves backwards, so a late-committing earlier call cannot reopen the day
    const lastLogin = player.lastLogin && player.lastLogin > now ? player.lastLogin : now;

    const updated = tx
      .update(schema.players)
      .set({
        firstLogin: player.firstLogin ?? now,
        lastLogin,
        points: credited ? player.points + PROGRESSION.DAILY_LOGIN_BONUS : player.points,
      })
      .where(eq(schema.players.id, playerId))
      .returning()
      .get();

    return { player: updated ?? requirePlayer(tx, playerId), credited };
  });
}

// ─── Boosts ───

export function addBoost(
  db: ProgressionDb,
  playerId: string,
  boostId: string,
  amount: number = PROGRESSION.DEFAULT_BOOST_AMOUNT,
  now: Date = new Date(),
): PlayerBoost {
  assertNonNegativeInteger('amount', amount);
  return runInTransaction(db, (tx) => {
    requirePlayer(tx, playerId);
    requireBoost(tx, boostId);
    return accumulatePlayerBoost(tx, playerId, boostId, amount, now);
  });
}

// ─── Levels & Prizes ───

/**
 * Records an attempt at a level. Re-submitting overwrites completion and
 * score on the same row.
 */
export function recordLevelResult(
  db: ProgressionDb,
  playerId: string,
  levelId: string,
  result: LevelResult,
): PlayerLevel {
  assertNonNegativeInteger('score', result.score);
  return runInTransaction(db, (tx) => {
    requirePlayer(tx, playerId);
    requireLevel(tx, levelId);
    return upsertPlayerLevel(tx, playerId, levelId, result);
  });
}

/**
 * Grants every prize attached to a completed level that the player does not
 * hold yet. Returns only the grants made by this call, so a repeat call on
 * unchanged state returns an empty list. An incomplete or unattempted level
 * grants nothing.
 */
export function completeLevelAndGrantPrizes(
  db: ProgressionDb,
  playerId: string,
  levelId: string,
  now: Date = new Date(),
): PlayerPrize[] {
  return runInTransaction<PlayerPrize[]>(db, (tx) => {
    requirePlayer(tx, playerId);
    requireLevel(tx, levelId);

    const attempt = getPlayerLevel(tx, playerId, levelId);
    if (!attempt?.completed) return [];

    const created: PlayerPrize[] = [];
    for (const { prizeId } of scanLevelPrizes(tx, levelId)) {
      const grant = insertPlayerPrizeIfAbsent(tx, playerId, prizeId, now);
      if (grant) created.push(grant);
    }
    return created;
  });
}
