/**
 * League Site URL Module
 *
 * Constructs URLs for the league site's pages and exports.
 */

import type { RunConfig } from '../core/config.js';
import { isValidGameId, ValidationError } from '../util/validation.js';

/**
 * URL of the league's season page (player gallery, schedule export link)
 *
 * @example
 * leagueUrl(config)
 * // Returns: https://ibasketball.co.il/league/2025-2/
 */
export function leagueUrl(config: Pick<RunConfig, 'http' | 'league'>): string {
  return `${config.http.baseUrl}/league/${config.league.seasonSlug}/`;
}

/**
 * URL of a single match page
 *
 * @param gameId - Numeric game code from the schedule
 * @throws ValidationError if the code is not numeric
 *
 * @example
 * matchUrl(config, '24817')
 * // Returns: https://ibasketball.co.il/match/24817/
 */
export function matchUrl(config: Pick<RunConfig, 'http'>, gameId: string): string {
  if (!isValidGameId(gameId)) {
    throw new ValidationError(`Invalid game ID format: ${gameId}`, 'gameId');
  }
  return `${config.http.baseUrl}/match/${gameId}/`;
}

/**
 * Absolute URL of a player page linked from the gallery
 *
 * @param href - Link target as printed, absolute or relative
 * @param pageUrl - Page the link was found on
 * @throws ValidationError if the link cannot be resolved
 *
 * @example
 * playerPageUrl('/player/dana-levi/', 'https://ibasketball.co.il/league/2025-2/')
 * // Returns: https://ibasketball.co.il/player/dana-levi/
 */
export function playerPageUrl(href: string, pageUrl: string): string {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    throw new ValidationError(`Invalid player link: ${href}`, 'url');
  }
}

/**
 * URL of the schedule workbook export
 *
 * @param pageUrl - League season page URL
 * @param leagueId - `league_id` found on that page
 */
export function scheduleFeedUrl(pageUrl: string, leagueId: string): string {
  return `${pageUrl.replace(/\/+$/, '')}/?feed=xlsx&league_id=${encodeURIComponent(leagueId)}`;
}
