import { Hono } from 'hono';
import type { ProgressionDb } from '../db/index.js';
import { BOOST_INFO } from '../config.js';
import { listBoosts, listLevels, listPrizes, scanLevelPrizes } from '../engine/store.js';

export function catalogRoutes(db: ProgressionDb) {
  const catalog = new Hono();

  // GET /catalog: Boosts, levels (with attached prizes) and prizes
  catalog.get('/', (c) => {
    const boosts = listBoosts(db).map((boost) => ({
      ...boost,
      slug: BOOST_INFO[boost.type].slug,
    }));
    const levels = listLevels(db).map((level) => ({
      ...level,
      prizeIds: Array.from(scanLevelPrizes(db, level.id), (lp) => lp.prizeId),
    }));
    return c.json({ boosts, levels, prizes: listPrizes(db) });
  });

  return catalog;
}
