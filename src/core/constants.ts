/**
 * Application Constants
 *
 * Centralized location for request defaults, persisted table names and
 * the fixed labels the league site prints in Hebrew.
 */

/**
 * HTTP request defaults (in milliseconds)
 */
export const REQUEST_DEFAULTS = {
  /** Pause between consecutive requests to the league site */
  DELAY_MS: 1000,

  /** Timeout for a single page request */
  TIMEOUT_MS: 10000,

  /** Timeout for the schedule workbook download */
  WORKBOOK_TIMEOUT_MS: 15000,
} as const;

/**
 * File names of the persisted tables, relative to their folder
 */
export const TABLE_FILES = {
  playerDetails: (league: string) => `${league}_player_details.csv`,
  playerHistory: (league: string) => `${league}_player_history.csv`,
  playerAverages: (league: string) => `${league}_player_averages.csv`,
  teamAverages: (league: string) => `${league}_team_averages.csv`,
  opponentAverages: (league: string) => `${league}_opponent_averages.csv`,
  schedule: 'games_schedule.csv',
  quarters: 'game_quarters.csv',
  playerGameStats: 'game_player_stats.csv',
  teamGameStats: 'game_team_stats.csv',
} as const;

/**
 * Labels as printed by the league site
 */
export const SITE_LABELS = {
  /** Header of the player name column in box-score tables */
  PLAYER_COLUMN: 'שחקן',

  /** Name cell text of a team total row */
  TOTAL_ROW: 'סך הכל',

  /** Substring of a youth league name in a player's history */
  YOUTH_LEAGUE: 'נוער',

  /** data-metric attribute of the height field on a player page */
  HEIGHT_METRIC: 'גובה',

  /** Label of the jersey number field on a player page */
  NUMBER_LABEL: 'מספר',
} as const;

/**
 * Schedule workbook columns used by the game phase
 */
export const SCHEDULE_COLUMNS = {
  CODE: 'Code',
  HOME_TEAM: 'Home Team',
  AWAY_TEAM: 'Away Team',
  HOME_SCORE: 'Home Score',
} as const;
