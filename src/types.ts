// ─── Core Types ───

export const BOOST_TYPE_VALUES = ['DOUBLE_POINTS', 'SPEED', 'SHIELD'] as const;

export type BoostType = (typeof BOOST_TYPE_VALUES)[number];

export type EntityName =
  | 'player'
  | 'boost'
  | 'level'
  | 'prize'
  | 'player_boost'
  | 'player_level'
  | 'level_prize'
  | 'player_prize';

export interface BoostInfo {
  slug: string;
  description: string;
}

// ─── Records ───

export interface Player {
  id: string;
  firstLogin: Date | null;
  lastLogin: Date | null;
  points: number;
}

export interface Boost {
  id: string;
  type: BoostType;
  description: string;
}

export interface Level {
  id: string;
  title: string;
  order: number;
}

export interface Prize {
  id: string;
  title: string;
}

export interface PlayerBoost {
  playerId: string;
  boostId: string;
  amount: number;
  createdAt: Date;
}

export interface PlayerLevel {
  playerId: string;
  levelId: string;
  completed: Date | null; // null = not completed
  score: number;
}

export interface LevelPrize {
  levelId: string;
  prizeId: string;
}

export interface PlayerPrize {
  playerId: string;
  prizeId: string;
  receivedAt: Date;
}

// ─── Operation inputs ───

export interface LevelResult {
  completed: Date | null;
  score: number;
}

export interface PlayerLevelExportRow {
  playerId: string;
  levelTitle: string;
  completed: boolean;
  prizeTitle: string;
}

export interface PlayerSummary {
  player: Player;
  boosts: Array<PlayerBoost & { type: BoostType }>;
  levels: Array<PlayerLevel & { title: string }>;
  prizes: Array<PlayerPrize & { title: string }>;
}
