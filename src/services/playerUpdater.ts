/**
 * Player Details Phase
 *
 * Lists the league's players, fetches the pages of those whose persisted
 * record is incomplete and rewrites the detail and history tables.
 */

import { FetchError, PhaseError, toError, ValidationError } from '../errors/index.js';
import { leagueUrl, playerPageUrl } from '../http/leagueClient.js';
import { parsePlayerBio, parsePlayerHistory, parsePlayerList } from '../parsers/playerPages.js';
import {
  loadExistingPlayers,
  recordFromRows,
  savePlayers,
  type PlayerRecord
} from '../store/repositories/players.js';
import type { RunContext } from '../types/context.js';
import type { PlayerBio, PlayerHistory, PlayerListing } from '../types/records.js';
import { needsDetailFetch } from './completenessPlanner.js';
import type { TeamResolver } from './teamResolver.js';

export interface PlayerPhaseResult {
  total: number;
  new: number;
  updated: number;
  skipped: number;
  failed: number;
}

const EMPTY_BIO: PlayerBio = { dateOfBirth: '', height: '', number: '' };

/**
 * Fetches one player page and reads both bio and history from it
 *
 * @throws ValidationError when the gallery link is malformed
 * @throws FetchError when the page cannot be retrieved
 */
async function fetchPlayer(ctx: RunContext, player: PlayerListing, pageUrl: string): Promise<{ bio: PlayerBio; history: PlayerHistory }> {
  const $ = await ctx.fetcher.fetchDocument(playerPageUrl(player.url, pageUrl));
  return { bio: parsePlayerBio($), history: parsePlayerHistory($) };
}

/**
 * Runs the player details phase
 *
 * @throws PhaseError when the player list cannot be read or is empty
 */
export async function updatePlayers(ctx: RunContext, resolve: TeamResolver): Promise<PlayerPhaseResult> {
  const { config, logger, store } = ctx;
  const existing = await loadExistingPlayers(store, config);

  const pageUrl = leagueUrl(config);
  let listing: PlayerListing[];
  try {
    listing = parsePlayerList(await ctx.fetcher.fetchDocument(pageUrl));
  } catch (err) {
    throw new PhaseError('Could not fetch player list', 'players', toError(err));
  }
  if (listing.length === 0) {
    throw new PhaseError('No players found', 'players');
  }
  logger.info({ players: listing.length }, 'Fetched player list');

  const result: PlayerPhaseResult = { total: listing.length, new: 0, updated: 0, skipped: 0, failed: 0 };
  const records: PlayerRecord[] = [];

  for (const [index, player] of listing.entries()) {
    const team = resolve(player.team);
    const detail = existing.details.get(player.name);
    const history = existing.history.get(player.name);
    const decision = needsDetailFetch(player.name, detail, history);

    if (!decision.fetch && detail) {
      records.push({ name: player.name, team, ...recordFromRows(detail, history) });
      result.skipped++;
      continue;
    }

    logger.info({ player: player.name, reason: decision.reason, progress: `${index + 1}/${listing.length}` }, 'Fetching player');
    try {
      records.push({ name: player.name, team, ...(await fetchPlayer(ctx, player, pageUrl)) });
      if (detail) result.updated++;
      else result.new++;
    } catch (err) {
      if (!(err instanceof FetchError || err instanceof ValidationError)) throw err;
      logger.warn({ err, player: player.name, url: player.url }, 'Failed to fetch player page');
      result.failed++;
      records.push(detail
        ? { name: player.name, team, ...recordFromRows(detail, history) }
        : { name: player.name, team, bio: EMPTY_BIO, history: {} });
    }
  }

  await savePlayers(store, config, records);
  logger.info(result, 'Player details updated');
  return result;
}
