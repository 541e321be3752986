/**
 * Box-Score Normalizer
 *
 * Turns the raw tables of a match page into canonical numeric records:
 * per-quarter scores, per-player lines and per-team totals.
 *
 * Shooting percentages are always recomputed from made/attempted counts;
 * the percentages printed by the site are rounded differently and are
 * discarded. Optional sections that are missing or malformed yield empty
 * lists; only a failed fetch (upstream of this module) is an error.
 */

import type { CheerioAPI } from 'cheerio';
import { SITE_LABELS } from '../core/constants.js';
import type { Logger } from '../core/logger.js';
import { StructureError } from '../errors/index.js';
import {
  readPerformanceSections,
  readResultsTable,
  type HeaderCell,
  type PerformanceSection,
  type RawRow,
  type ResultsRow,
  type TeamStatLabel
} from '../parsers/gamePage.js';
import type {
  BoxField,
  BoxStats,
  GameBoxScore,
  PlayerGameStat,
  Quarter,
  QuarterRecord,
  ShootingStats,
  SupplementalField,
  TeamGameStat
} from '../types/records.js';
import { coerceNumeric, percentage } from '../util/numeric.js';
import type { TeamResolver } from './teamResolver.js';

type RawFields = Record<string, string>;

const QUARTERS: readonly Quarter[] = ['Q1', 'Q2', 'Q3', 'Q4'];

/** Composite "made-attempted" fields and the counts they split into */
const COMPOSITE_SHOTS = {
  fgs: ['2ptm', '2pta'],
  threeps: ['3ptm', '3pta'],
  fts: ['ftm', 'fta'],
} as const;

/** Labels of the team-stats block and the fields they feed */
export const TEAM_STAT_LABELS: Readonly<Record<string, SupplementalField>> = {
  'נקודות מהזדמנות שנייה:': 'second_chance_pts',
  'נקודות ספסל:': 'bench_pts',
  'נקודות ממתפרצת:': 'fast_break_pts',
  'נקודות בצבע:': 'points_in_paint',
  'נקודות מאיבודים:': 'pts_off_turnovers',
};

const NAME_KEY = 'player_name';
const STARTER_CLASS = 'lineup';
const TOTAL_ROW_CLASS = 'sp-total-row';

// ============================================
// Field-level normalization
// ============================================

/**
 * Splits the composite shooting fields and recomputes every percentage
 *
 * "7-12" in `fgs` becomes 2ptm=7, 2pta=12, 2pt_pct=58.3. When a composite
 * field is absent, already-split counts are read instead. Non-numeric
 * counts become 0; a percentage with no attempts is 0.
 */
export function splitShooting(fields: RawFields): ShootingStats {
  const counts: Record<string, number> = {};
  for (const [composite, [madeKey, attemptedKey]] of Object.entries(COMPOSITE_SHOTS)) {
    const raw = fields[composite];
    if (raw !== undefined) {
      const [made = '', attempted = ''] = raw.split('-');
      counts[madeKey] = coerceNumeric(made);
      counts[attemptedKey] = coerceNumeric(attempted);
    } else {
      counts[madeKey] = coerceNumeric(fields[madeKey]);
      counts[attemptedKey] = coerceNumeric(fields[attemptedKey]);
    }
  }

  const twoMade = counts['2ptm'];
  const twoAttempted = counts['2pta'];
  const threeMade = counts['3ptm'];
  const threeAttempted = counts['3pta'];
  const fgm = twoMade + threeMade;
  const fga = twoAttempted + threeAttempted;

  return {
    '2ptm': twoMade,
    '2pta': twoAttempted,
    '2pt_pct': percentage(twoMade, twoAttempted),
    '3ptm': threeMade,
    '3pta': threeAttempted,
    '3pt_pct': percentage(threeMade, threeAttempted),
    fgm,
    fga,
    fg_pct: percentage(fgm, fga),
    ftm: counts.ftm,
    fta: counts.fta,
    ft_pct: percentage(counts.ftm, counts.fta)
  };
}

export interface PlayingTime {
  /** False when the clock reads zero or the cell is blank */
  played: boolean;
  minutes: number;
}

/**
 * Parses the minutes cell
 *
 * "mm:ss" rounds to the nearest minute (30 seconds rounds up), a bare
 * integer passes through, anything else is 0 minutes.
 *
 * @example
 * parseMinutes('24:29') // { played: true, minutes: 24 }
 * parseMinutes('24:30') // { played: true, minutes: 25 }
 * parseMinutes('0:00')  // { played: false, minutes: 0 }
 */
export function parseMinutes(raw: string | undefined): PlayingTime {
  const text = (raw ?? '').trim();
  if (!text) return { played: false, minutes: 0 };

  const clock = text.match(/^(\d+):(\d+)$/);
  if (clock) {
    const mins = Number(clock[1]);
    const secs = Number(clock[2]);
    return { played: mins + secs > 0, minutes: secs >= 30 ? mins + 1 : mins };
  }

  if (/^\d+$/.test(text)) {
    const mins = Number(text);
    return { played: mins > 0, minutes: mins };
  }

  return { played: true, minutes: 0 };
}

function boxStats(fields: RawFields): BoxStats {
  const stat = (field: BoxField) => coerceNumeric(fields[field]);
  return {
    pts: stat('pts'),
    def: stat('def'),
    off: stat('off'),
    reb: stat('reb'),
    pf: stat('pf'),
    pfa: stat('pfa'),
    stl: stat('stl'),
    to: stat('to'),
    ast: stat('ast'),
    blk: stat('blk'),
    blka: stat('blka'),
    rate: stat('rate')
  };
}

// ============================================
// Quarters
// ============================================

/**
 * Per-quarter rows from the line-score table, one per team per quarter
 *
 * @throws StructureError unless exactly two team rows are present
 */
export function normalizeQuarters(rows: readonly ResultsRow[], gameId: string, resolve: TeamResolver): QuarterRecord[] {
  if (rows.length !== 2) {
    throw new StructureError(`Expected 2 teams in results table, found ${rows.length}`, 'quarters');
  }

  const teams = rows.map(row => resolve(row.team));
  const records: QuarterRecord[] = [];
  rows.forEach((row, idx) => {
    const opponentRow = rows[1 - idx];
    QUARTERS.forEach((quarter, q) => {
      records.push({
        game_id: gameId,
        team: teams[idx],
        opponent: teams[1 - idx],
        quarter,
        score: coerceNumeric(row.quarters[q]),
        score_against: coerceNumeric(opponentRow.quarters[q])
      });
    });
  });
  return records;
}

// ============================================
// Player lines
// ============================================

/**
 * Field key of each column of a player table, taken from the header text
 *
 * The player column maps to `player_name` whatever its position.
 */
export function playerColumnKeys(headers: readonly HeaderCell[]): string[] {
  return headers.map(header => (header.text === SITE_LABELS.PLAYER_COLUMN ? NAME_KEY : header.text));
}

interface PlayerCells {
  name: string;
  url: string;
  fields: RawFields;
}

/**
 * Reads a body row through the column keys
 *
 * @throws StructureError when the row's cell count differs from the header's
 */
function readPlayerCells(row: RawRow, columnKeys: readonly string[]): PlayerCells {
  if (row.cells.length !== columnKeys.length) {
    throw new StructureError(
      `Row has ${row.cells.length} cells for ${columnKeys.length} columns`,
      'player-stats'
    );
  }

  const result: PlayerCells = { name: '', url: '', fields: {} };
  row.cells.forEach((cell, idx) => {
    const columnKey = columnKeys[idx];
    if (columnKey === NAME_KEY || cell.isName) {
      result.name = cell.linkText ?? cell.text;
      result.url = cell.href ?? '';
      return;
    }
    result.fields[cell.dataKey ?? columnKey] = cell.text;
  });
  return result;
}

/**
 * One team's player lines
 *
 * Total rows are skipped, rows with a clock of zero are dropped entirely,
 * and rows that do not line up with the header are logged and skipped.
 */
export function normalizePlayerSection(
  section: PerformanceSection,
  gameId: string,
  resolve: TeamResolver,
  logger: Logger
): PlayerGameStat[] {
  const team = resolve(section.team);
  const columnKeys = playerColumnKeys(section.headers);
  const players: PlayerGameStat[] = [];
  const totalRow = findTotalRow(section);

  for (const row of section.bodyRows) {
    if (row === totalRow || row.classes.includes(TOTAL_ROW_CLASS)) continue;

    let cells: PlayerCells;
    try {
      cells = readPlayerCells(row, columnKeys);
    } catch (err) {
      if (!(err instanceof StructureError)) throw err;
      logger.warn({ gameId, team, err: err.message }, 'Skipping misaligned player row');
      continue;
    }

    if (!cells.name) continue;
    const time = parseMinutes(cells.fields.min);
    if (!time.played) continue;

    players.push({
      game_id: gameId,
      team,
      number: cells.fields['#'] ?? cells.fields.number ?? '',
      player_name: cells.name,
      player_url: cells.url,
      starter: row.classes.includes(STARTER_CLASS) ? 1 : 0,
      min: time.minutes,
      ...boxStats(cells.fields),
      ...splitShooting(cells.fields)
    });
  }

  return players;
}

// ============================================
// Team totals
// ============================================

/**
 * Locates a team's total row
 *
 * A footer row marked `sp-total-row` wins; otherwise the last body row
 * whose name cell reads the site's "total" label.
 */
export function findTotalRow(section: PerformanceSection): RawRow | undefined {
  const footer = section.footerRows.find(row => row.classes.includes(TOTAL_ROW_CLASS));
  if (footer) return footer;

  for (let i = section.bodyRows.length - 1; i >= 0; i--) {
    const nameCell = section.bodyRows[i].cells.find(cell => cell.isName);
    if (nameCell && nameCell.text.includes(SITE_LABELS.TOTAL_ROW)) return section.bodyRows[i];
  }
  return undefined;
}

/**
 * Field key of each column of a team table, from `data-*` header classes
 */
export function teamColumnKeys(headers: readonly HeaderCell[]): Array<string | undefined> {
  return headers.map(header => header.classKey);
}

function readTotalCells(row: RawRow, columnKeys: ReadonlyArray<string | undefined>): RawFields {
  const fields: RawFields = {};
  row.cells.forEach((cell, idx) => {
    if (cell.isName) return;
    const key = cell.classKey ?? columnKeys[idx];
    if (key) fields[key] = cell.text;
  });
  return fields;
}

/**
 * Supplemental categories from the labeled team-stats block
 *
 * Known labels land on their fields; unknown labels are kept verbatim.
 */
export function readTeamStatLabels(labels: readonly TeamStatLabel[]): {
  supplemental: Partial<Record<SupplementalField, number>>;
  extras: Record<string, string | number>;
} {
  const supplemental: Partial<Record<SupplementalField, number>> = {};
  const extras: Record<string, string | number> = {};
  for (const { label, value } of labels) {
    const field = TEAM_STAT_LABELS[label];
    if (field) {
      supplemental[field] = coerceNumeric(value);
    } else {
      extras[label] = /^\d+$/.test(value) ? Number(value) : value;
    }
  }
  return { supplemental, extras };
}

/**
 * One team's total line, or null when the section has no total row
 */
export function normalizeTeamSection(
  section: PerformanceSection,
  gameId: string,
  resolve: TeamResolver
): TeamGameStat | null {
  const totalRow = findTotalRow(section);
  if (!totalRow) return null;

  const fields = readTotalCells(totalRow, teamColumnKeys(section.headers));
  const { supplemental, extras } = readTeamStatLabels(section.teamStats);

  return {
    game_id: gameId,
    team: resolve(section.team),
    ...boxStats(fields),
    ...splitShooting(fields),
    ...supplemental,
    extras
  };
}

// ============================================
// Whole page
// ============================================

/**
 * Normalizes a fetched match page
 *
 * Each section is extracted independently; a malformed section is logged
 * and contributes nothing, the others are still returned.
 */
export function normalizeBoxScore($: CheerioAPI, gameId: string, resolve: TeamResolver, logger: Logger): GameBoxScore {
  let quarters: QuarterRecord[] = [];
  try {
    quarters = normalizeQuarters(readResultsTable($), gameId, resolve);
  } catch (err) {
    if (!(err instanceof StructureError)) throw err;
    logger.warn({ gameId, section: err.section, err: err.message }, 'Skipping quarter scores');
  }

  const sections = readPerformanceSections($);
  const players = sections.flatMap(section => normalizePlayerSection(section, gameId, resolve, logger));
  const teams = sections
    .map(section => normalizeTeamSection(section, gameId, resolve))
    .filter((team): team is TeamGameStat => team !== null);

  return { quarters, players, teams };
}
