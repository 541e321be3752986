import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/core/config.js';
import { ValidationError } from '../../src/errors/index.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});
    expect(config.league).toEqual({ name: 'leumit', seasonSlug: '2025-2' });
    expect(config.http).toEqual({
      baseUrl: 'https://ibasketball.co.il',
      requestDelayMs: 1000,
      requestTimeoutMs: 10000,
      workbookTimeoutMs: 15000
    });
    expect(config.paths).toEqual({
      dataRoot: path.join('data', 'leumit'),
      gamesDir: path.join('data', 'leumit', 'leumit_games'),
      teamNamesFile: path.join('data', 'leumit', 'team_names.csv'),
      logFile: path.join('data', 'leumit', 'update_log.txt')
    });
    expect(config.logLevel).toBe('info');
  });

  it('should derive paths from the league and data root', () => {
    const config = loadConfig({ LEAGUE_NAME: 'testleague', DATA_ROOT: '/tmp/out', BASE_URL: 'https://league.test/' });
    expect(config.http.baseUrl).toBe('https://league.test');
    expect(config.paths.gamesDir).toBe(path.join('/tmp/out', 'testleague_games'));
  });

  it('should reject an invalid base URL', () => {
    expect(() => loadConfig({ BASE_URL: 'not a url' })).toThrow(ValidationError);
  });

  it('should reject non-numeric delays', () => {
    expect(() => loadConfig({ REQUEST_DELAY_MS: 'soon' })).toThrow(ValidationError);
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: '-5' })).toThrow(ValidationError);
  });

  it('should accept numeric overrides', () => {
    expect(loadConfig({ REQUEST_DELAY_MS: '0' }).http.requestDelayMs).toBe(0);
  });
});
