import path from 'path';
import type { BoostInfo, BoostType } from './types.js';

// ─── Boost Catalog ───
export const BOOST_INFO: Record<BoostType, BoostInfo> = {
  DOUBLE_POINTS: { slug: 'double_points', description: 'x2 points' },
  SPEED: { slug: 'speed', description: 'speed up' },
  SHIELD: { slug: 'shield', description: 'shield against losses' },
};

// ─── Progression Rules ───
export const PROGRESSION = {
  DAILY_LOGIN_BONUS: 10,
  DEFAULT_BOOST_AMOUNT: 1,
  TITLE_MAX_LENGTH: 100,
} as const;

// ─── Runtime Settings ───
function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

export const SETTINGS = {
  DB_PATH: process.env.DB_PATH || path.join(process.cwd(), 'data', 'progression.db'),
  PORT: intFromEnv('PORT', 3000),
  EXPORT_PATH: process.env.EXPORT_PATH || 'player_levels_export.csv',
  EXPORT_BATCH_SIZE: intFromEnv('EXPORT_BATCH_SIZE', 1000),
  SEED_PLAYERS: intFromEnv('SEED_PLAYERS', 1000),
  SEED_LEVELS: intFromEnv('SEED_LEVELS', 100),
  DEV_MODE: process.env.DEV_MODE === 'true',
} as const;
