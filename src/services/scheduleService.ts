/**
 * Schedule Service
 *
 * Finds the league's schedule export on the season page, downloads the
 * XLSX workbook and converts its first sheet to rows of displayed text.
 */

import type { CheerioAPI } from 'cheerio';
import * as XLSX from 'xlsx';
import type { RunConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { FetchError, PhaseError, toError } from '../errors/index.js';
import { leagueUrl, scheduleFeedUrl } from '../http/leagueClient.js';
import type { PageFetcher } from '../http/pageFetcher.js';
import type { TableRow } from '../store/tableStore.js';

/**
 * Reads `league_id` from the export link of the season page
 *
 * @returns The id, or null when the page has no export link carrying one
 */
export function extractLeagueId($: CheerioAPI): string | null {
  const href = $('a.export').first().attr('href');
  if (!href || !href.includes('league_id=')) return null;
  const id = href.split('league_id=')[1].split('&')[0];
  return id || null;
}

/**
 * Converts the first sheet of a workbook into rows keyed by header text
 *
 * Cells come back as displayed, so numeric codes stay "24817" and blank
 * cells are empty strings.
 *
 * @throws FetchError when the bytes are not a readable workbook
 */
export function workbookRows(data: Buffer, url: string): TableRow[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer' });
  } catch (err) {
    const error = toError(err);
    throw new FetchError(`Unreadable schedule workbook: ${error.message}`, url, 200, error);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return [];
  return XLSX.utils.sheet_to_json<Record<string, string>>(sheet, { raw: false, defval: '' });
}

/**
 * Downloads the current schedule
 *
 * @throws PhaseError when there is no league id or the sheet is empty
 * @throws FetchError when a download fails
 */
export async function fetchSchedule(
  fetcher: PageFetcher,
  config: Pick<RunConfig, 'http' | 'league'>,
  logger: Logger
): Promise<TableRow[]> {
  const pageUrl = leagueUrl(config);
  const page = await fetcher.fetchDocument(pageUrl);
  const leagueId = extractLeagueId(page);
  if (leagueId === null) {
    throw new PhaseError('Could not find league_id on the league page', 'games');
  }

  const feedUrl = scheduleFeedUrl(pageUrl, leagueId);
  const rows = workbookRows(await fetcher.fetchBinary(feedUrl), feedUrl);
  if (rows.length === 0) {
    throw new PhaseError('Schedule workbook has no rows', 'games');
  }

  logger.info({ leagueId, games: rows.length }, 'Games schedule downloaded');
  return rows;
}
