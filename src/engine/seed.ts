import { v4 as uuid } from 'uuid';
import { runInTransaction, schema, type ProgressionDb } from '../db/index.js';
import { BOOST_INFO } from '../config.js';
import { BOOST_TYPE_VALUES, type Boost, type BoostType, type Level, type Prize } from '../types.js';
import { attachPrizeToLevel, createLevel, createPlayer, createPrize, getBoostByType } from './store.js';
import { addBoost, completeLevelAndGrantPrizes, login, recordLevelResult } from './progression.js';

export interface SeedOptions {
  players: number;
  levels: number;
  now?: Date;
}

export interface SeedResult {
  boosts: Record<BoostType, Boost>;
  levels: Level[];
  prizes: Prize[];
  playerIds: string[];
}

// Starting stock handed to every example player
export const STARTER_BOOSTS: Record<BoostType, number> = {
  DOUBLE_POINTS: 2,
  SPEED: 1,
  SHIELD: 3,
};

/**
 * Installs exactly one catalog boost per boost type. Safe to run on every
 * start: existing boosts are left as they are.
 */
export function bootstrapCatalog(db: ProgressionDb): Record<BoostType, Boost> {
  return runInTransaction(db, (tx) => {
    const install = (type: BoostType): Boost => {
      tx.insert(schema.boosts)
        .values({ id: uuid(), type, description: BOOST_INFO[type].description })
        .onConflictDoNothing({ target: schema.boosts.type })
        .run();
      const boost = getBoostByType(tx, type);
      if (!boost) throw new Error(`Boost ${type} missing after bootstrap`);
      return boost;
    };
    return {
      DOUBLE_POINTS: install('DOUBLE_POINTS'),
      SPEED: install('SPEED'),
      SHIELD: install('SHIELD'),
    };
  });
}

/** Which (player, level) pairs the example data marks as completed. */
export function isSeededCompletion(playerIndex: number, levelIndex: number): boolean {
  return (playerIndex + levelIndex) % 2 === 0;
}

/**
 * Generates example data: `levels` levels each awarding one prize, and
 * `players` players who log in, receive the starter boosts and attempt every
 * level with score 100. Completed attempts receive their prizes.
 */
export function seedExampleData(db: ProgressionDb, options: SeedOptions): SeedResult {
  const now = options.now ?? new Date();
  const boosts = bootstrapCatalog(db);

  const { levels, prizes } = runInTransaction(db, (tx) => {
    const levels: Level[] = [];
    const prizes: Prize[] = [];
    for (let i = 0; i < options.levels; i++) {
      const level = createLevel(tx, `Level ${i + 1}`, i + 1);
      const prize = createPrize(tx, `Prize ${i + 1}`);
      attachPrizeToLevel(tx, level.id, prize.id);
      levels.push(level);
      prizes.push(prize);
    }
    return { levels, prizes };
  });
  console.log(`[Seed] Created ${levels.length} level(s) with prizes`);

  const playerIds: string[] = [];
  let grants = 0;
  for (let p = 0; p < options.players; p++) {
    const { id } = createPlayer(db);
    playerIds.push(id);

    login(db, id, now);
    for (const type of BOOST_TYPE_VALUES) {
      addBoost(db, id, boosts[type].id, STARTER_BOOSTS[type], now);
    }

    levels.forEach((level, l) => {
      const completed = isSeededCompletion(p, l) ? now : null;
      recordLevelResult(db, id, level.id, { completed, score: 100 });
      grants += completeLevelAndGrantPrizes(db, id, level.id, now).length;
    });
  }
  console.log(`[Seed] Created ${playerIds.length} player(s), granted ${grants} prize(s)`);

  return { boosts, levels, prizes, playerIds };
}
