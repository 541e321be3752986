/**
 * Application Service
 *
 * Runs one update of the league data: player details, then game details,
 * then averages. A failed phase stops the run, since each phase reads what
 * the previous one wrote.
 */

import { loadConfig } from '../core/config.js';
import { bootstrapLogger, createLogger, type Logger } from '../core/logger.js';
import { PhaseError, toError } from '../errors/index.js';
import { HttpPageFetcher } from '../http/pageFetcher.js';
import { averagesTablePaths } from '../store/repositories/averages.js';
import { gameTablePaths } from '../store/repositories/games.js';
import { playerTablePaths } from '../store/repositories/players.js';
import { CsvTableStore } from '../store/tableStore.js';
import type { RunContext } from '../types/context.js';
import { calculateAverages, type AveragesPhaseResult } from './averagesCalculator.js';
import { updateGames, type GamePhaseResult } from './gameUpdater.js';
import { updatePlayers, type PlayerPhaseResult } from './playerUpdater.js';
import { createTeamResolver, loadTeamMapping } from './teamResolver.js';

export interface FileSummary {
  path: string;
  /** Size in bytes, or null when the file was not written */
  bytes: number | null;
}

export interface RunSummary {
  players: PlayerPhaseResult;
  games: GamePhaseResult;
  averages: AveragesPhaseResult;
  files: FileSummary[];
}

async function runPhase<T>(ctx: RunContext, phase: string, task: () => Promise<T>): Promise<T> {
  ctx.logger.info({ phase }, 'Phase started');
  try {
    return await task();
  } catch (err) {
    const error = err instanceof PhaseError ? err : new PhaseError(toError(err).message, phase, toError(err));
    ctx.logger.error({ err: error, phase }, 'Phase failed');
    throw error;
  }
}

/**
 * Every table a run may write, in reporting order
 */
export function outputFiles(ctx: RunContext): string[] {
  const players = playerTablePaths(ctx.config);
  const averages = averagesTablePaths(ctx.config);
  const games = gameTablePaths(ctx.config);
  return [
    players.details,
    players.history,
    averages.players,
    averages.teams,
    averages.opponents,
    games.schedule,
    games.quarters,
    games.playerStats,
    games.teamStats
  ];
}

/**
 * Runs all three phases once
 *
 * The team mapping is loaded a single time and shared by the phases.
 *
 * @throws PhaseError from the first phase that fails
 */
export async function runUpdate(ctx: RunContext): Promise<RunSummary> {
  const { logger } = ctx;
  logger.info({ league: ctx.config.league.name, season: ctx.config.league.seasonSlug }, 'League update started');

  const mapping = await loadTeamMapping(ctx.store, ctx.config.paths.teamNamesFile, logger);
  const resolve = createTeamResolver(mapping, logger);

  const players = await runPhase(ctx, 'players', () => updatePlayers(ctx, resolve));
  const games = await runPhase(ctx, 'games', () => updateGames(ctx, resolve));
  const averages = await runPhase(ctx, 'averages', () => calculateAverages(ctx));

  const files: FileSummary[] = [];
  for (const path of outputFiles(ctx)) {
    const bytes = await ctx.store.sizeOf(path);
    files.push({ path, bytes });
    if (bytes === null) {
      logger.info({ path }, 'File not found');
    } else {
      logger.info({ path, kb: Number((bytes / 1024).toFixed(1)) }, 'File updated');
    }
  }

  logger.info('All updates completed successfully');
  return { players, games, averages, files };
}

/**
 * Builds the run from the environment and runs it once
 *
 * Failures before the run logger exists, such as invalid configuration,
 * are reported through `fallback`.
 *
 * @returns false when the run ended with a fatal error
 */
export async function startApp(env: NodeJS.ProcessEnv = process.env, fallback: Logger = bootstrapLogger): Promise<boolean> {
  let logger = fallback;
  try {
    const config = loadConfig(env);
    logger = createLogger(config);
    await runUpdate({
      config,
      logger,
      fetcher: new HttpPageFetcher(config, logger),
      store: new CsvTableStore(logger)
    });
    return true;
  } catch (err) {
    logger.fatal({ err }, 'Fatal error occurred');
    return false;
  }
}
