import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/core/config.js';
import { ValidationError } from '../../src/errors/index.js';
import { leagueUrl, matchUrl, playerPageUrl, scheduleFeedUrl } from '../../src/http/leagueClient.js';

const config = loadConfig({ BASE_URL: 'https://league.test', LEAGUE_SEASON_SLUG: '2030-1' });

describe('leagueClient', () => {
  it('should build the league and match page URLs', () => {
    expect(leagueUrl(config)).toBe('https://league.test/league/2030-1/');
    expect(matchUrl(config, '501')).toBe('https://league.test/match/501/');
  });

  it('should reject game codes that are not numeric', () => {
    expect(() => matchUrl(config, 'F-12')).toThrow(ValidationError);
  });

  it('should resolve relative player links against the page', () => {
    expect(playerPageUrl('/player/dana-levi/', 'https://league.test/league/2030-1/'))
      .toBe('https://league.test/player/dana-levi/');
  });

  it('should reject player links that cannot be resolved', () => {
    expect(() => playerPageUrl('http://[broken/', 'https://league.test/league/2030-1/')).toThrow(ValidationError);
  });

  it('should append the workbook feed query', () => {
    expect(scheduleFeedUrl('https://league.test/league/2030-1/', '77'))
      .toBe('https://league.test/league/2030-1/?feed=xlsx&league_id=77');
  });
});
