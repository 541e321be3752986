/**
 * Averages Phase
 *
 * Recomputes the three averages tables from the accumulated game tables.
 */

import { PhaseError } from '../errors/index.js';
import { saveAverages } from '../store/repositories/averages.js';
import { gameTablePaths } from '../store/repositories/games.js';
import type { RunContext } from '../types/context.js';
import { aggregate } from './aggregation.js';

export interface AveragesPhaseResult {
  players: number;
  teams: number;
}

/**
 * @throws PhaseError when either game table is missing
 */
export async function calculateAverages(ctx: RunContext): Promise<AveragesPhaseResult> {
  const { config, logger, store } = ctx;
  const paths = gameTablePaths(config);

  const playerRows = await store.load(paths.playerStats);
  if (playerRows === null) throw new PhaseError('No player stats found', 'averages');
  const teamRows = await store.load(paths.teamStats);
  if (teamRows === null) throw new PhaseError('No team stats found', 'averages');

  const averages = aggregate(playerRows, teamRows);
  await saveAverages(store, config, averages);

  const result = { players: averages.players.rows.length, teams: averages.teams.rows.length };
  logger.info(result, 'Averages calculated');
  return result;
}
