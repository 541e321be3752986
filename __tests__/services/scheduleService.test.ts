import { load } from 'cheerio';
import * as XLSX from 'xlsx';
import { describe, it, expect } from 'vitest';
import { extractLeagueId, fetchSchedule, workbookRows } from '../../src/services/scheduleService.js';
import { loadConfig } from '../../src/core/config.js';
import { PhaseError } from '../../src/errors/index.js';
import { FakePageFetcher } from '../helpers/fakeFetcher.js';
import { silentLogger } from '../helpers/logger.js';

function workbook(rows: unknown[][]): Buffer {
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), 'Games');
  return XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
}

const config = loadConfig({ BASE_URL: 'https://league.test', LEAGUE_SEASON_SLUG: '2030-1' });
const leaguePage = 'https://league.test/league/2030-1/';

describe('scheduleService', () => {
  describe('extractLeagueId', () => {
    it('should read league_id from the export link', () => {
      const $ = load('<a class="export" href="https://league.test/league/2030-1/?feed=xlsx&league_id=77&lang=he">Excel</a>');
      expect(extractLeagueId($)).toBe('77');
    });

    it('should return null without an export link or id', () => {
      expect(extractLeagueId(load('<a href="/?league_id=77">Excel</a>'))).toBeNull();
      expect(extractLeagueId(load('<a class="export" href="/?feed=xlsx">Excel</a>'))).toBeNull();
    });
  });

  describe('workbookRows', () => {
    it('should return the first sheet as displayed text', () => {
      const data = workbook([
        ['Code', 'Home Team', 'Away Team', 'Home Score'],
        [501, 'Harbor City', 'Ridge Town', 75],
        [502, 'Ridge Town', 'Harbor City', null]
      ]);
      expect(workbookRows(data, 'feed')).toEqual([
        { Code: '501', 'Home Team': 'Harbor City', 'Away Team': 'Ridge Town', 'Home Score': '75' },
        { Code: '502', 'Home Team': 'Ridge Town', 'Away Team': 'Harbor City', 'Home Score': '' }
      ]);
    });
  });

  describe('fetchSchedule', () => {
    it('should download the feed named on the league page', async () => {
      const feedUrl = `${leaguePage}?feed=xlsx&league_id=77`;
      const fetcher = new FakePageFetcher(
        new Map([[leaguePage, `<a class="export" href="${feedUrl}">Excel</a>`]]),
        new Map([[feedUrl, workbook([['Code', 'Home Score'], [501, 75]])]])
      );

      expect(await fetchSchedule(fetcher, config, silentLogger)).toEqual([{ Code: '501', 'Home Score': '75' }]);
      expect(fetcher.requested).toEqual([leaguePage, feedUrl]);
    });

    it('should fail when the league page has no export link', async () => {
      const fetcher = new FakePageFetcher(new Map([[leaguePage, '<p>no export</p>']]));
      await expect(fetchSchedule(fetcher, config, silentLogger)).rejects.toBeInstanceOf(PhaseError);
    });

    it('should fail on an empty sheet', async () => {
      const feedUrl = `${leaguePage}?feed=xlsx&league_id=77`;
      const fetcher = new FakePageFetcher(
        new Map([[leaguePage, `<a class="export" href="${feedUrl}">Excel</a>`]]),
        new Map([[feedUrl, workbook([['Code', 'Home Score']])]])
      );
      await expect(fetchSchedule(fetcher, config, silentLogger)).rejects.toThrow('Schedule workbook has no rows');
    });
  });
});
