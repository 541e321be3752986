import { describe, it, expect } from 'vitest';
import {
  aggregate,
  estimatePossessions,
  meanOf,
  opponentAverages,
  opponentGameRows,
  playerAverages,
  teamAverages
} from '../../src/services/aggregation.js';
import type { TableRow } from '../../src/store/tableStore.js';

// Two games between the same two teams, as read back from the store
const teamRows: TableRow[] = [
  { game_id: '1', team: 'Harbor City', pts: '80', '2ptm': '20', '2pta': '40', fga: '65', fta: '15', off: '10', to: '12', bench_pts: '12' },
  { game_id: '1', team: 'Ridge Town', pts: '70', '2ptm': '18', '2pta': '40', fga: '60', fta: '10', off: '12', to: '10', bench_pts: '' },
  { game_id: '2', team: 'Ridge Town', pts: '90', '2ptm': '24', '2pta': '44', fga: '62', fta: '16', off: '10', to: '10', bench_pts: '' },
  { game_id: '2', team: 'Harbor City', pts: '90', '2ptm': '25', '2pta': '45', fga: '65', fta: '20', off: '8', to: '14', bench_pts: '20' }
];

const playerRows: TableRow[] = [
  { game_id: '1', team: 'Ridge Town', player_name: 'Noa Cohen', starter: '0', min: '12', pts: '6' },
  { game_id: '1', team: 'Harbor City', player_name: 'Dana Levi', starter: '1', min: '25', pts: '18', '2ptm': '5', '2pta': '9', '3ptm': '2', '3pta': '4', fgm: '7', fga: '13' },
  { game_id: '2', team: 'Harbor City', player_name: 'Dana Levi', starter: '0', min: '20', pts: '10', '2ptm': '3', '2pta': '7', '3ptm': '1', '3pta': '5', fgm: '4', fga: '12' }
];

describe('aggregation', () => {
  describe('meanOf', () => {
    it('should skip blank cells and count text as zero', () => {
      expect(meanOf([{ x: '' }, { x: '5' }, { x: null }], 'x')).toBe(5);
      expect(meanOf([{ x: 'abc' }, { x: '4' }], 'x')).toBe(2);
      expect(meanOf([{ y: '1' }], 'x')).toBeNull();
    });
  });

  describe('estimatePossessions', () => {
    it('should apply fga + 0.44 fta - off + to', () => {
      expect(estimatePossessions(80, 20, 10, 14)).toBe(92.8);
      expect(estimatePossessions(60, 20, 10, 12)).toBe(70.8);
      expect(estimatePossessions(65, 17.5, 9, 13)).toBe(76.7);
    });
  });

  describe('playerAverages', () => {
    const table = playerAverages(playerRows);

    it('should emit one row per player and team, sorted', () => {
      expect(table.rows.map(row => row.player_name)).toEqual(['Dana Levi', 'Noa Cohen']);
    });

    it('should count games and starts', () => {
      expect(table.rows[0].games_played).toBe(2);
      expect(table.rows[0].games_started).toBe(1);
      expect(table.rows[1].games_started).toBe(0);
    });

    it('should recompute percentages from averaged counts', () => {
      const dana = table.rows[0];
      expect(dana.min).toBe(22.5);
      expect(dana.pts).toBe(14);
      expect(dana['2pt_pct']).toBe(50);
      expect(dana['3pt_pct']).toBe(33.3);
      expect(dana.fg_pct).toBe(44);
      expect(dana.ft_pct).toBe(0);
    });

    it('should use the fixed column order', () => {
      expect(table.columns.slice(0, 9)).toEqual([
        'player_name', 'team', 'games_played', 'games_started', 'min', 'pts', 'fgm', 'fga', 'fg_pct'
      ]);
    });
  });

  describe('teamAverages', () => {
    const table = teamAverages(teamRows);
    const [harbor, ridge] = table.rows;

    it('should average per team', () => {
      expect(harbor.team).toBe('Harbor City');
      expect(harbor.games_played).toBe(2);
      expect(harbor.pts).toBe(85);
      expect(ridge.pts).toBe(80);
      expect(harbor.bench_pts).toBe(16);
      expect(ridge.bench_pts).toBeNull();
    });

    it('should derive the percentage from averages, not average the ratios', () => {
      expect(harbor['2pta']).toBe(42.5);
      expect(harbor['2pt_pct']).toBe(52.9);
    });

    it('should estimate possessions', () => {
      expect(harbor.possessions).toBe(76.7);
    });

    it('should rank each statistic in its own direction', () => {
      expect(harbor.pts_rank).toBe(1);
      expect(ridge.pts_rank).toBe(2);
      expect(ridge.to_rank).toBe(1);
      expect(harbor.to_rank).toBe(2);
      expect(harbor.bench_pts_rank).toBe(1);
      expect(ridge.bench_pts_rank).toBeNull();
    });

    it('should place each rank right after its statistic', () => {
      expect(table.columns.slice(0, 6)).toEqual(['team', 'games_played', 'pts', 'pts_rank', '2ptm', '2ptm_rank']);
      expect(table.columns.slice(-2)).toEqual(['ft_pct', 'ft_pct_rank']);
    });
  });

  describe('opponentAverages', () => {
    it('should pair each team with the other team of the game', () => {
      const rows = opponentGameRows(teamRows);
      expect(rows).toHaveLength(4);
      expect(rows[0]).toMatchObject({ team: 'Harbor City', game_id: '1', opp_pts: '70' });
      expect(rows[1]).toMatchObject({ team: 'Ridge Town', game_id: '1', opp_pts: '80' });
    });

    it('should skip games without exactly two teams', () => {
      expect(opponentGameRows([...teamRows, { game_id: '3', team: 'Harbor City', pts: '77' }])).toHaveLength(4);
    });

    it('should rank allowed stats low-to-high except opponent turnovers', () => {
      const table = opponentAverages(teamRows);
      const [harbor, ridge] = table.rows;
      expect(harbor.opp_pts).toBe(80);
      expect(ridge.opp_pts).toBe(85);
      expect(harbor.opp_pts_rank).toBe(1);
      expect(ridge.opp_pts_rank).toBe(2);
      expect(harbor.opp_to).toBe(10);
      expect(ridge.opp_to).toBe(13);
      expect(ridge.opp_to_rank).toBe(1);
      expect(harbor.opp_to_rank).toBe(2);
    });

    it('should drop bench points and fouls drawn from the opponent view', () => {
      const { columns } = opponentAverages(teamRows);
      expect(columns).not.toContain('opp_bench_pts');
      expect(columns).not.toContain('opp_pfa');
      expect(columns.slice(-2)).toEqual(['opp_possessions', 'opp_possessions_rank']);
    });
  });

  describe('aggregate', () => {
    it('should merge points allowed after the points rank', () => {
      const { teams } = aggregate(playerRows, teamRows);
      expect(teams.columns.slice(0, 6)).toEqual([
        'team', 'games_played', 'pts', 'pts_rank', 'pts_allowed', 'pts_allowed_rank'
      ]);
      expect(teams.rows[0]).toMatchObject({ team: 'Harbor City', pts_allowed: 80, pts_allowed_rank: 1 });
      expect(teams.rows[1]).toMatchObject({ team: 'Ridge Town', pts_allowed: 85, pts_allowed_rank: 2 });
    });
  });
});
