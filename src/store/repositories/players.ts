/**
 * Player Repository
 *
 * Reads and writes the player detail and history tables.
 */

import path from 'node:path';
import type { RunConfig } from '../../core/config.js';
import { TABLE_FILES } from '../../core/constants.js';
import { DETAIL_COLUMNS, HISTORY_BIO_COLUMNS } from '../../services/completenessPlanner.js';
import type { PlayerBio, PlayerHistory } from '../../types/records.js';
import type { TableRow, TableStore } from '../tableStore.js';

export const DETAIL_TABLE_COLUMNS = [
  DETAIL_COLUMNS.NAME,
  DETAIL_COLUMNS.TEAM,
  DETAIL_COLUMNS.DOB,
  DETAIL_COLUMNS.HEIGHT,
  DETAIL_COLUMNS.NUMBER
];

export interface PlayerRecord {
  name: string;
  team: string;
  bio: PlayerBio;
  history: PlayerHistory;
}

export interface ExistingPlayers {
  details: Map<string, TableRow>;
  history: Map<string, TableRow>;
}

export function playerTablePaths(config: Pick<RunConfig, 'paths' | 'league'>) {
  return {
    details: path.join(config.paths.dataRoot, TABLE_FILES.playerDetails(config.league.name)),
    history: path.join(config.paths.dataRoot, TABLE_FILES.playerHistory(config.league.name))
  };
}

function byName(rows: TableRow[] | null): Map<string, TableRow> {
  const map = new Map<string, TableRow>();
  for (const row of rows ?? []) {
    const name = row[DETAIL_COLUMNS.NAME];
    if (typeof name === 'string' && name) map.set(name, row);
  }
  return map;
}

/**
 * Loads the persisted detail and history rows, keyed by player name
 */
export async function loadExistingPlayers(store: TableStore, config: Pick<RunConfig, 'paths' | 'league'>): Promise<ExistingPlayers> {
  const paths = playerTablePaths(config);
  return {
    details: byName(await store.load(paths.details)),
    history: byName(await store.load(paths.history))
  };
}

function cell(value: TableRow[string]): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Rebuilds a player's bio and history from persisted rows
 */
export function recordFromRows(detail: TableRow, history: TableRow | undefined): Pick<PlayerRecord, 'bio' | 'history'> {
  const seasons: PlayerHistory = {};
  for (const [column, value] of Object.entries(history ?? {})) {
    if (!HISTORY_BIO_COLUMNS.includes(column)) seasons[column] = cell(value);
  }
  return {
    bio: {
      dateOfBirth: cell(detail[DETAIL_COLUMNS.DOB]),
      height: cell(detail[DETAIL_COLUMNS.HEIGHT]),
      number: cell(detail[DETAIL_COLUMNS.NUMBER])
    },
    history: seasons
  };
}

/**
 * Rewrites both player tables
 *
 * History columns are the bio columns followed by every season seen,
 * newest first.
 */
export async function savePlayers(
  store: TableStore,
  config: Pick<RunConfig, 'paths' | 'league'>,
  players: readonly PlayerRecord[]
): Promise<void> {
  const paths = playerTablePaths(config);
  const seasons = new Set<string>();

  const details: TableRow[] = [];
  const history: TableRow[] = [];
  for (const player of players) {
    const bio = {
      [DETAIL_COLUMNS.DOB]: player.bio.dateOfBirth,
      [DETAIL_COLUMNS.HEIGHT]: player.bio.height,
      [DETAIL_COLUMNS.NUMBER]: player.bio.number
    };
    details.push({ [DETAIL_COLUMNS.NAME]: player.name, [DETAIL_COLUMNS.TEAM]: player.team, ...bio });
    history.push({ Name: player.name, 'Current Team': player.team, ...bio, ...player.history });
    Object.keys(player.history).forEach(season => seasons.add(season));
  }

  const sortedSeasons = [...seasons].sort().reverse();
  await store.save(details, paths.details, DETAIL_TABLE_COLUMNS);
  await store.save(history, paths.history, [...HISTORY_BIO_COLUMNS, ...sortedSeasons]);
}
