/**
 * Game Repository
 *
 * Per-game tables live in the games folder: the schedule snapshot and the
 * three append-only tables filled from match pages.
 */

import path from 'node:path';
import type { RunConfig } from '../../core/config.js';
import type { Logger } from '../../core/logger.js';
import { TABLE_FILES } from '../../core/constants.js';
import { SHOOTING_FIELDS, SUPPLEMENTAL_FIELDS, type GameBoxScore, type TeamGameStat } from '../../types/records.js';
import { normalizeGameId } from '../../util/gameId.js';
import type { TableRow, TableStore } from '../tableStore.js';

export const QUARTER_COLUMNS = ['game_id', 'team', 'opponent', 'quarter', 'score', 'score_against'];

const COUNTING_COLUMNS = ['def', 'off', 'reb', 'pf', 'pfa', 'stl', 'to', 'ast', 'blk', 'blka', 'rate'];

export const PLAYER_STAT_COLUMNS = [
  'game_id', 'team', 'number', 'player_name', 'player_url', 'starter', 'min', 'pts',
  ...SHOOTING_FIELDS,
  ...COUNTING_COLUMNS
];

export const TEAM_STAT_COLUMNS = [
  'game_id', 'team', 'pts',
  ...SHOOTING_FIELDS,
  ...COUNTING_COLUMNS,
  ...SUPPLEMENTAL_FIELDS
];

export function gameTablePaths(config: Pick<RunConfig, 'paths'>) {
  const dir = config.paths.gamesDir;
  return {
    schedule: path.join(dir, TABLE_FILES.schedule),
    quarters: path.join(dir, TABLE_FILES.quarters),
    playerStats: path.join(dir, TABLE_FILES.playerGameStats),
    teamStats: path.join(dir, TABLE_FILES.teamGameStats)
  };
}

/**
 * Unrecognized team-stat labels become extra columns after the known ones
 */
export function teamStatRow(stat: TeamGameStat): TableRow {
  const { extras, ...fields } = stat;
  return { ...extras, ...fields };
}

/**
 * Game ids already present in the quarter table
 *
 * An unreadable table is treated as empty, so every completed game is
 * fetched again rather than the phase failing.
 */
export async function loadExistingGameIds(
  store: TableStore,
  config: Pick<RunConfig, 'paths'>,
  logger: Logger
): Promise<Set<string>> {
  const ids = new Set<string>();
  const filePath = gameTablePaths(config).quarters;
  let rows: TableRow[] | null;
  try {
    rows = await store.load(filePath);
  } catch (err) {
    logger.warn({ err, filePath }, 'Could not read existing quarters data');
    return ids;
  }

  for (const row of rows ?? []) {
    const id = normalizeGameId(row.game_id);
    if (id !== null) ids.add(id);
  }
  return ids;
}

export async function saveSchedule(
  store: TableStore,
  config: Pick<RunConfig, 'paths'>,
  rows: readonly TableRow[]
): Promise<void> {
  await store.save(rows, gameTablePaths(config).schedule);
}

/**
 * Appends the box scores of newly fetched games
 *
 * Tables with nothing to add are left untouched.
 */
export async function appendBoxScores(
  store: TableStore,
  config: Pick<RunConfig, 'paths'>,
  scores: readonly GameBoxScore[]
): Promise<void> {
  const paths = gameTablePaths(config);
  const quarters: TableRow[] = scores.flatMap(score => score.quarters.map(q => ({ ...q })));
  const players: TableRow[] = scores.flatMap(score => score.players.map(p => ({ ...p })));
  const teams: TableRow[] = scores.flatMap(score => score.teams.map(teamStatRow));

  if (quarters.length > 0) await store.append(quarters, paths.quarters, QUARTER_COLUMNS);
  if (players.length > 0) await store.append(players, paths.playerStats, PLAYER_STAT_COLUMNS);
  if (teams.length > 0) await store.append(teams, paths.teamStats, TEAM_STAT_COLUMNS);
}
