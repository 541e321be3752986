/**
 * Domain Record Types
 *
 * Value records produced by the sync engine. Records never reference each
 * other; relationships are shared key fields (player name, team, game id).
 * Field names match the persisted column names.
 */

/** Normalized team identifier, one per real-world team */
export type CanonicalTeam = string;

/** Shooting split fields, in persisted column order */
export const SHOOTING_FIELDS = [
  '2ptm', '2pta', '2pt_pct',
  '3ptm', '3pta', '3pt_pct',
  'fgm', 'fga', 'fg_pct',
  'ftm', 'fta', 'ft_pct'
] as const;

/** Box-score counting fields shared by player and team rows */
export const BOX_FIELDS = [
  'pts', 'def', 'off', 'reb', 'pf', 'pfa', 'stl', 'to', 'ast', 'blk', 'blka', 'rate'
] as const;

/** Team-only categories read from the labeled team-stats block */
export const SUPPLEMENTAL_FIELDS = [
  'second_chance_pts', 'bench_pts', 'fast_break_pts', 'points_in_paint', 'pts_off_turnovers'
] as const;

export type ShootingField = typeof SHOOTING_FIELDS[number];
export type BoxField = typeof BOX_FIELDS[number];
export type SupplementalField = typeof SUPPLEMENTAL_FIELDS[number];

export type ShootingStats = Record<ShootingField, number>;
export type BoxStats = Record<BoxField, number>;

export type Quarter = 'Q1' | 'Q2' | 'Q3' | 'Q4';

export interface QuarterRecord {
  game_id: string;
  team: CanonicalTeam;
  opponent: CanonicalTeam;
  quarter: Quarter;
  score: number;
  score_against: number;
}

export interface PlayerGameStat extends ShootingStats, BoxStats {
  game_id: string;
  team: CanonicalTeam;
  number: string;
  player_name: string;
  player_url: string;
  starter: 0 | 1;
  min: number;
}

export interface TeamGameStat extends ShootingStats, BoxStats, Partial<Record<SupplementalField, number>> {
  game_id: string;
  team: CanonicalTeam;
  /** Team-stat labels with no known field, kept verbatim */
  extras: Record<string, string | number>;
}

export interface GameBoxScore {
  quarters: QuarterRecord[];
  players: PlayerGameStat[];
  teams: TeamGameStat[];
}

/** Entry of the league's player gallery */
export interface PlayerListing {
  name: string;
  team: string;
  url: string;
}

export interface PlayerBio {
  dateOfBirth: string;
  height: string;
  number: string;
}

/** Normalized season label ("2024-25") to a description of the team(s) played for */
export type PlayerHistory = Record<string, string>;
