import { describe, it, expect } from 'vitest';
import { REQUEST_DEFAULTS, SCHEDULE_COLUMNS, SITE_LABELS, TABLE_FILES } from '../src/core/constants.js';

describe('constants', () => {
  it('should have all required request defaults', () => {
    expect(REQUEST_DEFAULTS.DELAY_MS).toBe(1000);
    expect(REQUEST_DEFAULTS.TIMEOUT_MS).toBe(10000);
    expect(REQUEST_DEFAULTS.WORKBOOK_TIMEOUT_MS).toBe(15000);
  });

  it('should prefix league tables with the league name', () => {
    expect(TABLE_FILES.playerDetails('leumit')).toBe('leumit_player_details.csv');
    expect(TABLE_FILES.playerHistory('leumit')).toBe('leumit_player_history.csv');
    expect(TABLE_FILES.opponentAverages('leumit')).toBe('leumit_opponent_averages.csv');
    expect(TABLE_FILES.quarters).toBe('game_quarters.csv');
  });

  it('should have the site labels used by the parsers', () => {
    expect(SITE_LABELS.PLAYER_COLUMN).toBe('שחקן');
    expect(SITE_LABELS.TOTAL_ROW).toBe('סך הכל');
    expect(SITE_LABELS.YOUTH_LEAGUE).toBe('נוער');
    expect(SCHEDULE_COLUMNS.HOME_SCORE).toBe('Home Score');
  });
});
