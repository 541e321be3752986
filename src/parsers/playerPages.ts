/**
 * Player Page Readers
 *
 * Reads the league's player gallery and individual player pages.
 */

import type { CheerioAPI } from 'cheerio';
import { SITE_LABELS } from '../core/constants.js';
import type { PlayerBio, PlayerHistory, PlayerListing } from '../types/records.js';
import { textPieces } from './dom.js';

/**
 * Players listed in the league gallery (`.player-gallery a.player`)
 */
export function parsePlayerList($: CheerioAPI): PlayerListing[] {
  const players: PlayerListing[] = [];
  $('.player-gallery a.player').each((_, el) => {
    const link = $(el);
    const name = textPieces(link)[0];
    const url = link.attr('href');
    if (!name || !url) return;
    players.push({ name, team: link.find('span').first().text().trim(), url });
  });
  return players;
}

/**
 * "1999-04-23" → "23/04/1999"
 */
export function formatBirthDate(raw: string): string {
  return raw ? raw.split('-').reverse().join('/') : '';
}

/**
 * "2024-2025" → "2024-25"; anything else is returned unchanged
 */
export function normalizeSeason(raw: string): string {
  const parts = raw.split('-');
  return parts.length === 2 ? `${parts[0]}-${parts[1].slice(-2)}` : raw;
}

/**
 * Date of birth, height and jersey number from a player page
 *
 * Fields missing from the page come back as empty strings.
 */
export function parsePlayerBio($: CheerioAPI): PlayerBio {
  const dob = textPieces($('div.data-birthdate').first()).at(-1) ?? '';
  const height = textPieces($(`div.data-other[data-metric="${SITE_LABELS.HEIGHT_METRIC}"]`).first()).at(-1) ?? '';

  let number = '';
  $('ul.general li').each((_, li) => {
    const item = $(li);
    const label = item.find('span.label').first();
    if (!label.length || !label.text().includes(SITE_LABELS.NUMBER_LABEL)) return;
    const data = item.find('span.data-number').first();
    if (!data.length) return;
    number = data.text().trim();
    return false;
  });

  return { dateOfBirth: formatBirthDate(dob), height, number };
}

/**
 * Season-by-season history from a player page (`div.data-teams`)
 *
 * Each `<br>` is followed by a season span, a team link and a league link.
 * Entries of the same season are joined with ", ". Reading stops at the
 * second youth-league entry, which is not recorded.
 */
export function parsePlayerHistory($: CheerioAPI): PlayerHistory {
  const history: PlayerHistory = {};
  const container = $('div.data-teams').first();
  if (!container.length) return history;

  let youthEntries = 0;
  for (const br of container.find('br').toArray()) {
    const seasonSpan = $(br).nextAll('span[title]').first();
    if (!seasonSpan.length) continue;
    const teamLink = seasonSpan.nextAll('a').first();
    if (!teamLink.length) continue;
    const leagueLink = teamLink.nextAll('a').first();
    if (!leagueLink.length) continue;

    const season = normalizeSeason(seasonSpan.text().trim());
    const team = teamLink.text().trim();
    const league = leagueLink.text().trim();

    if (league.includes(SITE_LABELS.YOUTH_LEAGUE)) {
      youthEntries += 1;
      if (youthEntries > 1) break;
    }

    const entry = `${team} (${league})`;
    history[season] = history[season] ? `${history[season]}, ${entry}` : entry;
  }

  return history;
}
