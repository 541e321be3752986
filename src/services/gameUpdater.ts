/**
 * Game Details Phase
 *
 * Refreshes the schedule snapshot, fetches the match page of every
 * completed game not yet stored and appends its box score.
 */

import { SCHEDULE_COLUMNS } from '../core/constants.js';
import { FetchError, PhaseError, toError, ValidationError } from '../errors/index.js';
import { matchUrl } from '../http/leagueClient.js';
import { appendBoxScores, loadExistingGameIds, saveSchedule } from '../store/repositories/games.js';
import type { TableRow } from '../store/tableStore.js';
import type { RunContext } from '../types/context.js';
import type { GameBoxScore } from '../types/records.js';
import { normalizeGameId } from '../util/gameId.js';
import { isCompletedGame, needsGameFetch } from './completenessPlanner.js';
import { normalizeBoxScore } from './boxScoreNormalizer.js';
import { fetchSchedule } from './scheduleService.js';
import type { TeamResolver } from './teamResolver.js';

export interface GamePhaseResult {
  scheduled: number;
  completed: number;
  pending: number;
  stored: number;
  skipped: number;
}

async function loadSchedule(ctx: RunContext): Promise<TableRow[]> {
  try {
    return await fetchSchedule(ctx.fetcher, ctx.config, ctx.logger);
  } catch (err) {
    if (err instanceof PhaseError) throw err;
    throw new PhaseError('Could not download games schedule', 'games', toError(err));
  }
}

/**
 * Runs the game details phase
 *
 * A game whose page yields no quarter scores is not stored at all, so it
 * stays pending and is fetched again on the next run. A game whose code
 * cannot be turned into a match URL or whose page cannot be fetched is
 * skipped; the rest of the batch is still stored.
 *
 * @throws PhaseError when the schedule cannot be obtained
 */
export async function updateGames(ctx: RunContext, resolve: TeamResolver): Promise<GamePhaseResult> {
  const { config, logger, store } = ctx;
  const schedule = await loadSchedule(ctx);
  await saveSchedule(store, config, schedule);

  if (!(SCHEDULE_COLUMNS.HOME_SCORE in schedule[0])) {
    throw new PhaseError(`'${SCHEDULE_COLUMNS.HOME_SCORE}' column not found`, 'games');
  }

  const completed = schedule.filter(isCompletedGame);
  const existing = await loadExistingGameIds(store, config, logger);
  const pending = needsGameFetch(schedule, existing);
  logger.info({ completed: completed.length, stored: existing.size, pending: pending.length }, 'Games schedule checked');

  const result: GamePhaseResult = {
    scheduled: schedule.length,
    completed: completed.length,
    pending: pending.length,
    stored: 0,
    skipped: 0
  };
  if (pending.length === 0) {
    logger.info('All games already fetched');
    return result;
  }

  const byId = new Map<string, TableRow>();
  for (const row of completed) {
    const id = normalizeGameId(row[SCHEDULE_COLUMNS.CODE]);
    if (id !== null && !byId.has(id)) byId.set(id, row);
  }

  const scores: GameBoxScore[] = [];
  for (const [index, gameId] of pending.entries()) {
    const row = byId.get(gameId);
    logger.info({
      gameId,
      home: row?.[SCHEDULE_COLUMNS.HOME_TEAM],
      away: row?.[SCHEDULE_COLUMNS.AWAY_TEAM],
      progress: `${index + 1}/${pending.length}`
    }, 'Fetching game');

    let score: GameBoxScore;
    try {
      const $ = await ctx.fetcher.fetchDocument(matchUrl(config, gameId));
      score = normalizeBoxScore($, gameId, resolve, logger);
    } catch (err) {
      if (!(err instanceof FetchError || err instanceof ValidationError)) throw err;
      logger.warn({ err, gameId }, 'Error fetching game, skipping');
      result.skipped++;
      continue;
    }

    if (score.quarters.length === 0) {
      if (score.players.length === 0 && score.teams.length === 0) {
        logger.warn({ gameId }, 'No stats found for game, may not have detailed stats yet');
      } else {
        logger.warn({ gameId }, 'No quarter scores for game, leaving it for the next run');
      }
      result.skipped++;
      continue;
    }
    scores.push(score);
  }

  await appendBoxScores(store, config, scores);
  result.stored = scores.length;
  logger.info(result, 'Game stats updated');
  return result;
}
