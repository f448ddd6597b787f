import { sqliteTable, text, integer, index, primaryKey } from 'drizzle-orm/sqlite-core';
import { BOOST_TYPE_VALUES } from '../types.js';

// ─── Players ───
export const players = sqliteTable('players', {
  id: text('id').primaryKey(),
  firstLogin: integer('first_login', { mode: 'timestamp_ms' }),
  lastLogin: integer('last_login', { mode: 'timestamp_ms' }),
  points: integer('points').notNull().default(0),
});

// ─── Boost Catalog ───
export const boosts = sqliteTable('boosts', {
  id: text('id').primaryKey(),
  type: text('type', { enum: BOOST_TYPE_VALUES }).notNull().unique(),
  description: text('description').notNull(),
});

// ─── Player Boosts (accumulated amount per boost) ───
export const playerBoosts = sqliteTable('player_boosts', {
  playerId: text('player_id').notNull().references(() => players.id, { onDelete: 'cascade' }),
  boostId: text('boost_id').notNull().references(() => boosts.id, { onDelete: 'cascade' }),
  amount: integer('amount').notNull().default(1), // CHECK amount >= 0
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.playerId, table.boostId] }),
  playerIdx: index('ix_playerboost_player').on(table.playerId),
  boostIdx: index('ix_playerboost_boost').on(table.boostId),
}));

// ─── Levels ───
export const levels = sqliteTable('levels', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  order: integer('order').notNull().default(0), // display hint, never a gate
});

// ─── Prize Catalog ───
export const prizes = sqliteTable('prizes', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
});

// ─── Level Prizes (which prizes a level awards) ───
export const levelPrizes = sqliteTable('level_prizes', {
  levelId: text('level_id').notNull().references(() => levels.id, { onDelete: 'cascade' }),
  prizeId: text('prize_id').notNull().references(() => prizes.id, { onDelete: 'cascade' }),
}, (table) => ({
  pk: primaryKey({ columns: [table.levelId, table.prizeId] }),
  levelIdx: index('ix_levelprize_level').on(table.levelId),
  prizeIdx: index('ix_levelprize_prize').on(table.prizeId),
}));

// ─── Player Levels (one row per attempt pair, mutated on retry) ───
export const playerLevels = sqliteTable('player_levels', {
  playerId: text('player_id').notNull().references(() => players.id, { onDelete: 'cascade' }),
  levelId: text('level_id').notNull().references(() => levels.id, { onDelete: 'cascade' }),
  completed: integer('completed', { mode: 'timestamp_ms' }), // null = not completed
  score: integer('score').notNull().default(0), // CHECK score >= 0
}, (table) => ({
  pk: primaryKey({ columns: [table.playerId, table.levelId] }),
  playerIdx: index('ix_playerlevel_player').on(table.playerId),
  levelIdx: index('ix_playerlevel_level').on(table.levelId),
  completedIdx: index('ix_playerlevel_completed').on(table.completed),
}));

// ─── Player Prizes (grant events, at most one per prize) ───
export const playerPrizes = sqliteTable('player_prizes', {
  playerId: text('player_id').notNull().references(() => players.id, { onDelete: 'cascade' }),
  prizeId: text('prize_id').notNull().references(() => prizes.id, { onDelete: 'cascade' }),
  receivedAt: integer('received_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.playerId, table.prizeId] }),
  playerIdx: index('ix_playerprize_player').on(table.playerId),
  prizeIdx: index('ix_playerprize_prize').on(table.prizeId),
}));
