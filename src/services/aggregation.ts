/**
 * Aggregation & Ranking Engine
 *
 * Folds the accumulated per-game tables into per-player, per-team and
 * per-opponent averages, with league ranks for the team tables.
 *
 * Percentages are never averaged: they are recomputed from the averaged
 * made/attempted counts. Blank cells are missing values and do not count
 * towards a mean; non-numeric text counts as 0.
 */

import type { TableRow } from '../store/tableStore.js';
import { SUPPLEMENTAL_FIELDS } from '../types/records.js';
import { coerceNumeric, coerceOptional, percentage, roundTo } from '../util/numeric.js';
import { rankMin, type RankOrder } from './ranking.js';

export type AverageValue = string | number | null;
export type AverageRow = Record<string, AverageValue>;

export interface AveragesTable {
  columns: string[];
  rows: AverageRow[];
}

export interface Averages {
  players: AveragesTable;
  teams: AveragesTable;
  opponents: AveragesTable;
}

/** Shot categories whose percentage is recomputed after averaging */
const PERCENTAGES = [
  ['2pt_pct', '2ptm', '2pta'],
  ['3pt_pct', '3ptm', '3pta'],
  ['fg_pct', 'fgm', 'fga'],
  ['ft_pct', 'ftm', 'fta'],
] as const;

const PLAYER_AVERAGED = [
  'pts', '2ptm', '2pta', '3ptm', '3pta', 'fgm', 'fga',
  'ftm', 'fta', 'def', 'off', 'reb', 'pf', 'pfa',
  'stl', 'to', 'ast', 'blk', 'blka', 'rate', 'min'
];

export const PLAYER_AVERAGE_COLUMNS = [
  'player_name', 'team', 'games_played', 'games_started', 'min', 'pts',
  'fgm', 'fga', 'fg_pct',
  '2ptm', '2pta', '2pt_pct',
  '3ptm', '3pta', '3pt_pct',
  'ftm', 'fta', 'ft_pct',
  'def', 'off', 'reb',
  'ast', 'stl', 'to', 'pf', 'pfa',
  'blk', 'blka', 'rate'
];

const TEAM_AVERAGED = [
  'pts', '2ptm', '2pta', '3ptm', '3pta', 'fgm', 'fga',
  'ftm', 'fta', 'def', 'off', 'reb', 'pf', 'pfa',
  'stl', 'to', 'ast', 'blk', 'blka', 'rate',
  ...SUPPLEMENTAL_FIELDS
];

/** Team statistics after averaging, in output order (ranks interleaved later) */
const TEAM_STATS = [...TEAM_AVERAGED, 'possessions', '2pt_pct', '3pt_pct', 'fg_pct', 'ft_pct'];

const TEAM_HIGHER_IS_BETTER = new Set([
  'pts', 'fgm', 'fga', 'fg_pct', '2ptm', '2pta', '2pt_pct',
  '3ptm', '3pta', '3pt_pct', 'ftm', 'fta', 'ft_pct',
  'def', 'off', 'reb', 'ast', 'stl', 'blk', 'pfa', 'rate',
  ...SUPPLEMENTAL_FIELDS, 'possessions'
]);

const TEAM_LOWER_IS_BETTER = new Set(['to', 'pf', 'blka']);

/** Opponent fields with no meaning from the defending team's side */
const OPPONENT_DROPPED = new Set(['opp_bench_pts', 'opp_pfa']);

/** Forcing turnovers is good, so this one opponent stat ranks high-to-low */
const OPPONENT_HIGHER_IS_BETTER = new Set(['opp_to']);

const OPP = 'opp_';

// ============================================
// Helpers
// ============================================

function text(value: TableRow[string]): string {
  return value === null || value === undefined ? '' : String(value);
}

function groupRows(rows: readonly TableRow[], keyOf: (row: TableRow) => string[]): Array<[string[], TableRow[]]> {
  const groups = new Map<string, { key: string[]; rows: TableRow[] }>();
  for (const row of rows) {
    const key = keyOf(row);
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) group.rows.push(row);
    else groups.set(id, { key, rows: [row] });
  }
  return [...groups.values()]
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(group => [group.key, group.rows]);
}

function compareKeys(a: readonly string[], b: readonly string[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  return 0;
}

/**
 * Arithmetic mean of a column over the rows where it is present
 */
export function meanOf(rows: readonly TableRow[], column: string): number | null {
  let sum = 0;
  let count = 0;
  for (const row of rows) {
    const value = coerceOptional(row[column]);
    if (value === null) continue;
    sum += value;
    count += 1;
  }
  return count === 0 ? null : sum / count;
}

function num(row: AverageRow, column: string): number | null {
  const value = row[column];
  return typeof value === 'number' ? value : null;
}

/**
 * Estimated possessions: fga + 0.44·fta − off + to, to two decimals
 */
export function estimatePossessions(fga: number, fta: number, off: number, to: number): number {
  return roundTo(fga + 0.44 * fta - off + to, 2);
}

function addPercentages(row: AverageRow, prefix = ''): void {
  for (const [pct, made, attempted] of PERCENTAGES) {
    row[prefix + pct] = percentage(num(row, prefix + made) ?? 0, num(row, prefix + attempted) ?? 0, null);
  }
}

function addPossessions(row: AverageRow, prefix = ''): void {
  const fga = num(row, `${prefix}fga`);
  const fta = num(row, `${prefix}fta`);
  const off = num(row, `${prefix}off`);
  const to = num(row, `${prefix}to`);
  row[`${prefix}possessions`] = fga === null || fta === null || off === null || to === null
    ? null
    : estimatePossessions(fga, fta, off, to);
}

/**
 * Rounds every averaged column to one decimal; possessions keep two
 */
function roundAverages(row: AverageRow, columns: readonly string[]): void {
  for (const column of columns) {
    const value = num(row, column);
    if (value !== null && !column.endsWith('possessions')) row[column] = roundTo(value, 1);
  }
}

function addRanks(rows: AverageRow[], column: string, order: RankOrder): void {
  const ranks = rankMin(rows.map(row => num(row, column)), order);
  rows.forEach((row, idx) => {
    row[`${column}_rank`] = ranks[idx];
  });
}

/**
 * Key columns, then each statistic followed by its rank where it has one
 */
function interleaveRanks(keys: readonly string[], stats: readonly string[], ranked: ReadonlySet<string>): string[] {
  const columns = [...keys];
  for (const stat of stats) {
    columns.push(stat);
    if (ranked.has(stat)) columns.push(`${stat}_rank`);
  }
  return columns;
}

// ============================================
// Players
// ============================================

/**
 * Per-player averages, one row per (player, team)
 *
 * A player who changed teams gets one row per team.
 */
export function playerAverages(playerRows: readonly TableRow[]): AveragesTable {
  const rows = groupRows(playerRows, row => [text(row.player_name), text(row.team)]).map(([[player, team], games]) => {
    const avg: AverageRow = {
      player_name: player,
      team,
      games_played: games.length,
      games_started: games.reduce((sum, game) => sum + coerceNumeric(game.starter), 0)
    };
    for (const column of PLAYER_AVERAGED) avg[column] = meanOf(games, column);
    addPercentages(avg);
    roundAverages(avg, [...PLAYER_AVERAGED, ...PERCENTAGES.map(([pct]) => pct)]);
    return avg;
  });

  return { columns: [...PLAYER_AVERAGE_COLUMNS], rows };
}

// ============================================
// Teams
// ============================================

/**
 * Per-team averages with possessions and ranks
 */
export function teamAverages(teamRows: readonly TableRow[]): AveragesTable {
  const rows = groupRows(teamRows, row => [text(row.team)]).map(([[team], games]) => {
    const avg: AverageRow = { team, games_played: games.length };
    for (const column of TEAM_AVERAGED) avg[column] = meanOf(games, column);
    addPossessions(avg);
    addPercentages(avg);
    roundAverages(avg, TEAM_STATS);
    return avg;
  });

  const ranked = new Set<string>();
  for (const stat of TEAM_STATS) {
    if (TEAM_HIGHER_IS_BETTER.has(stat)) addRanks(rows, stat, 'higher-is-better');
    else if (TEAM_LOWER_IS_BETTER.has(stat)) addRanks(rows, stat, 'lower-is-better');
    else continue;
    ranked.add(stat);
  }

  return { columns: interleaveRanks(['team', 'games_played'], TEAM_STATS, ranked), rows };
}

// ============================================
// Opponents
// ============================================

/**
 * Each team's per-game opponent line: the other team's stats under `opp_`
 *
 * Only games with exactly two team rows contribute.
 */
export function opponentGameRows(teamRows: readonly TableRow[]): TableRow[] {
  const byGame = new Map<string, TableRow[]>();
  for (const row of teamRows) {
    const gameId = text(row.game_id);
    const game = byGame.get(gameId);
    if (game) game.push(row);
    else byGame.set(gameId, [row]);
  }

  const result: TableRow[] = [];
  for (const [gameId, game] of byGame) {
    if (game.length !== 2) continue;
    game.forEach((row, idx) => {
      const opponent = game[1 - idx];
      const opp: TableRow = { team: row.team, game_id: gameId };
      for (const column of TEAM_AVERAGED) opp[OPP + column] = opponent[column];
      result.push(opp);
    });
  }
  return result;
}

/**
 * Per-team averages of what opponents did against them, with ranks
 *
 * Allowing less ranks better for every field except opponent turnovers.
 */
export function opponentAverages(teamRows: readonly TableRow[]): AveragesTable {
  const averaged = TEAM_AVERAGED.map(column => OPP + column).filter(column => !OPPONENT_DROPPED.has(column));
  const stats = [
    ...averaged,
    ...PERCENTAGES.map(([pct]) => OPP + pct),
    `${OPP}possessions`
  ];

  const rows = groupRows(opponentGameRows(teamRows), row => [text(row.team)]).map(([[team], games]) => {
    const avg: AverageRow = { team, games_played: games.length };
    for (const column of averaged) avg[column] = meanOf(games, column);
    addPercentages(avg, OPP);
    addPossessions(avg, OPP);
    roundAverages(avg, stats);
    return avg;
  });

  for (const stat of stats) {
    addRanks(rows, stat, OPPONENT_HIGHER_IS_BETTER.has(stat) ? 'higher-is-better' : 'lower-is-better');
  }

  return { columns: interleaveRanks(['team', 'games_played'], stats, new Set(stats)), rows };
}

/**
 * Adds points allowed and its rank to the team table, right after the
 * team's own points and points rank
 */
export function mergePointsAllowed(teams: AveragesTable, opponents: AveragesTable): AveragesTable {
  const allowed = new Map(opponents.rows.map((row): [AverageValue, AverageRow] => [row.team, row]));
  if (allowed.size === 0) return teams;

  const rows = teams.rows.map(row => {
    const opp = allowed.get(row.team);
    return {
      ...row,
      pts_allowed: opp ? opp[`${OPP}pts`] ?? null : null,
      pts_allowed_rank: opp ? opp[`${OPP}pts_rank`] ?? null : null
    };
  });

  const columns = [...teams.columns];
  const anchor = columns.includes('pts_rank') ? columns.indexOf('pts_rank') : columns.indexOf('pts');
  columns.splice(anchor + 1, 0, 'pts_allowed', 'pts_allowed_rank');
  return { columns, rows };
}

/**
 * Computes all three averages tables
 *
 * @param playerRows - Accumulated per-player game rows
 * @param teamRows - Accumulated per-team game rows
 */
export function aggregate(playerRows: readonly TableRow[], teamRows: readonly TableRow[]): Averages {
  const opponents = opponentAverages(teamRows);
  return {
    players: playerAverages(playerRows),
    teams: mergePointsAllowed(teamAverages(teamRows), opponents),
    opponents
  };
}
