import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { ProgressionDb } from './db/index.js';
import { ConstraintViolationError, NotFoundError } from './errors.js';
import { SETTINGS } from './config.js';
import { playerRoutes } from './routes/players.js';
import { catalogRoutes } from './routes/catalog.js';
import { exportRoutes } from './routes/export.js';

export interface AppOptions {
  requestLogging?: boolean;
}

export function createApp(db: ProgressionDb, options: AppOptions = {}) {
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }

  // API docs
  app.get('/api', (c) => {
    return c.json({
      name: 'Progression Ledger',
      version: '0.1.0',
      description: 'Daily login points, stackable boosts and level prizes.',
      endpoints: {
        'GET /catalog': 'Boosts, levels and prizes',
        'POST /players': 'Create a player',
        'GET /players/:id': 'Player with boosts, levels and prizes',
        'DELETE /players/:id': 'Delete a player and all their records',
        'POST /players/:id/login': 'Daily login (10 points once per UTC day)',
        'POST /players/:id/boosts': 'Add to a boost stock ({ boostId, amount? })',
        'PUT /players/:id/levels/:levelId': 'Record an attempt ({ completed, score })',
        'POST /players/:id/levels/:levelId/prizes': 'Grant prizes for a completed level',
        'GET /export.csv': 'Player levels report',
      },
    });
  });

  // ─── Routes ───
  app.route('/catalog', catalogRoutes(db));
  app.route('/players', playerRoutes(db));
  app.route('/', exportRoutes(db));

  // ─── 404 ───
  app.notFound((c) => {
    return c.json({ error: 'Not found. Try GET /api for available endpoints.' }, 404);
  });

  // ─── Error Handler ───
  app.onError((err, c) => {
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message, code: err.code }, 404);
    }
    if (err instanceof ConstraintViolationError) {
      return c.json({ error: err.message, code: err.code }, 400);
    }
    console.error('🔥 Error:', err.message);
    console.error('Stack:', err.stack);
    return c.json({
      error: 'Internal server error',
      message: SETTINGS.DEV_MODE ? err.message : undefined,
    }, 500);
  });

  return app;
}
