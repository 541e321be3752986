/**
 * Averages Repository
 */

import path from 'node:path';
import type { RunConfig } from '../../core/config.js';
import { TABLE_FILES } from '../../core/constants.js';
import type { Averages } from '../../services/aggregation.js';
import type { TableStore } from '../tableStore.js';

export function averagesTablePaths(config: Pick<RunConfig, 'paths' | 'league'>) {
  const { dataRoot } = config.paths;
  const league = config.league.name;
  return {
    players: path.join(dataRoot, TABLE_FILES.playerAverages(league)),
    teams: path.join(dataRoot, TABLE_FILES.teamAverages(league)),
    opponents: path.join(dataRoot, TABLE_FILES.opponentAverages(league))
  };
}

/**
 * Rewrites the three averages tables
 */
export async function saveAverages(
  store: TableStore,
  config: Pick<RunConfig, 'paths' | 'league'>,
  averages: Averages
): Promise<void> {
  const paths = averagesTablePaths(config);
  await store.save(averages.players.rows, paths.players, averages.players.columns);
  await store.save(averages.teams.rows, paths.teams, averages.teams.columns);
  await store.save(averages.opponents.rows, paths.opponents, averages.opponents.columns);
}
