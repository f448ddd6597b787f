import { Hono } from 'hono';
import type { Context } from 'hono';
import type { ProgressionDb } from '../db/index.js';
import { NotFoundError } from '../errors.js';
import { PROGRESSION } from '../config.js';
import { createPlayer, deletePlayer, getPlayerSummary } from '../engine/store.js';
import { addBoost, completeLevelAndGrantPrizes, login, recordLevelResult } from '../engine/progression.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonObject(c: Context): Promise<Record<string, unknown> | null> {
  try {
    const body: unknown = await c.req.json();
    return isRecord(body) ? body : null;
  } catch {
    // Malformed JSON
    return null;
  }
}

export function playerRoutes(db: ProgressionDb) {
  const players = new Hono();

  // POST /players: Onboard a new player
  players.post('/', (c) => {
    const player = createPlayer(db);
    return c.json({ player }, 201);
  });

  // GET /players/:id: Player with boosts, levels and prizes
  players.get('/:id', (c) => {
    return c.json(getPlayerSummary(db, c.req.param('id')));
  });

  // DELETE /players/:id: Remove a player and everything they own
  players.delete('/:id', (c) => {
    const playerId = c.req.param('id');
    if (!deletePlayer(db, playerId)) {
      throw new NotFoundError('player', playerId);
    }
    return c.json({ deleted: true });
  });

  // POST /players/:id/login: Daily login
  players.post('/:id/login', (c) => {
    const { player, credited } = login(db, c.req.param('id'));
    return c.json({ player, credited, bonus: credited ? PROGRESSION.DAILY_LOGIN_BONUS : 0 });
  });

  // POST /players/:id/boosts: Add to a boost stock
  players.post('/:id/boosts', async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json({ error: 'JSON object body required' }, 400);
    }

    const { boostId, amount } = body;
    if (typeof boostId !== 'string' || boostId.length === 0) {
      return c.json({ error: 'boostId is required' }, 400);
    }
    if (amount !== undefined && typeof amount !== 'number') {
      return c.json({ error: 'amount must be a number' }, 400);
    }

    const playerBoost = addBoost(db, c.req.param('id'), boostId, amount);
    return c.json({ playerBoost });
  });

  // PUT /players/:id/levels/:levelId: Record an attempt
  players.put('/:id/levels/:levelId', async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json({ error: 'JSON object body required' }, 400);
    }

    const { completed, score } = body;
    if (typeof completed !== 'boolean') {
      return c.json({ error: 'completed must be a boolean' }, 400);
    }
    if (typeof score !== 'number') {
      return c.json({ error: 'score must be a number' }, 400);
    }

    const playerLevel = recordLevelResult(db, c.req.param('id'), c.req.param('levelId'), {
      completed: completed ? new Date() : null,
      score,
    });
    return c.json({ playerLevel });
  });

  // POST /players/:id/levels/:levelId/prizes: Grant the level's prizes
  players.post('/:id/levels/:levelId/prizes', (c) => {
    const granted = completeLevelAndGrantPrizes(db, c.req.param('id'), c.req.param('levelId'));
    return c.json({ granted, count: granted.length });
  });

  return players;
}
