/**
 * Configuration Module
 *
 * Builds the run configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 *
 * The resulting object is passed explicitly into every component; nothing
 * below reads paths or URLs from module scope.
 */

import 'dotenv/config';
import path from 'node:path';
import { isValidUrl, ValidationError } from '../util/validation.js';
import { REQUEST_DEFAULTS } from './constants.js';

export interface LeagueConfig {
  /** Short league name, used as the prefix of the persisted table files */
  name: string;
  /** Season slug in the league page URL (e.g. "2025-2") */
  seasonSlug: string;
}

export interface PathsConfig {
  dataRoot: string;
  gamesDir: string;
  teamNamesFile: string;
  logFile: string;
}

export interface HttpConfig {
  baseUrl: string;
  requestDelayMs: number;
  requestTimeoutMs: number;
  workbookTimeoutMs: number;
}

export interface RunConfig {
  league: LeagueConfig;
  http: HttpConfig;
  paths: PathsConfig;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function numberFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`Invalid numeric env var ${name}: ${raw}`, name);
  }
  return value;
}

/**
 * Reads the run configuration from an environment map
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ValidationError if the base URL or a numeric setting is invalid
 */
export function loadConfig(env: Env = process.env): RunConfig {
  const leagueName = env.LEAGUE_NAME || 'leumit';
  const dataRoot = env.DATA_ROOT || path.join('data', leagueName);

  const baseUrl = (env.BASE_URL || 'https://ibasketball.co.il').replace(/\/+$/, '');
  if (!isValidUrl(baseUrl)) {
    throw new ValidationError(`Invalid base URL: ${baseUrl}`, 'BASE_URL');
  }

  return {
    league: {
      name: leagueName,
      seasonSlug: env.LEAGUE_SEASON_SLUG || '2025-2'
    },
    http: {
      baseUrl,
      requestDelayMs: numberFrom(env, 'REQUEST_DELAY_MS', REQUEST_DEFAULTS.DELAY_MS),
      requestTimeoutMs: numberFrom(env, 'REQUEST_TIMEOUT_MS', REQUEST_DEFAULTS.TIMEOUT_MS),
      workbookTimeoutMs: numberFrom(env, 'WORKBOOK_TIMEOUT_MS', REQUEST_DEFAULTS.WORKBOOK_TIMEOUT_MS)
    },
    paths: {
      dataRoot,
      gamesDir: env.GAMES_DIR || path.join(dataRoot, `${leagueName}_games`),
      teamNamesFile: env.TEAM_NAMES_FILE || path.join(dataRoot, 'team_names.csv'),
      logFile: env.LOG_FILE || path.join(dataRoot, 'update_log.txt')
    },
    logLevel: env.LOG_LEVEL || 'info' // trace, debug, info, warn, error, fatal
  };
}
