import { openDatabase, type DatabaseHandle } from '../db/index.js';
import { bootstrapCatalog } from '../engine/seed.js';
import { attachPrizeToLevel, createLevel, createPlayer, createPrize } from '../engine/store.js';
import type { Boost, BoostType, Level, Player, Prize } from '../types.js';

export function freshDatabase(): DatabaseHandle {
  return openDatabase(':memory:');
}

export interface Fixture {
  player: Player;
  boosts: Record<BoostType, Boost>;
  level: Level;
  prizeX: Prize;
  prizeY: Prize;
}

/** One player, the boost catalog, and a level awarding Prize X then Prize Y. */
export function buildFixture({ db }: DatabaseHandle): Fixture {
  const boosts = bootstrapCatalog(db);
  const player = createPlayer(db);
  const level = createLevel(db, 'Level One', 1);
  const prizeX = createPrize(db, 'Prize X');
  const prizeY = createPrize(db, 'Prize Y');
  attachPrizeToLevel(db, level.id, prizeX.id);
  attachPrizeToLevel(db, level.id, prizeY.id);
  return { player, boosts, level, prizeX, prizeY };
}
