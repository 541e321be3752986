/**
 * Team Identity Resolver
 *
 * The league site spells the same team differently on the roster gallery,
 * the schedule feed and the box scores. A reference table lists, per team,
 * the normalized name and the variants seen in the wild; this module turns
 * it into an immutable lookup and resolves labels against it.
 */

import type { Logger } from '../core/logger.js';
import type { TableStore, TableRow } from '../store/tableStore.js';
import type { CanonicalTeam } from '../types/records.js';

export type TeamNameMapping = ReadonlyMap<string, CanonicalTeam>;

export type ResolveOutcome = 'exact' | 'trimmed' | 'miss' | 'unmapped';

export interface ResolveResult {
  team: CanonicalTeam;
  outcome: ResolveOutcome;
}

/** Reference table columns */
export const TEAM_NAME_COLUMNS = {
  CANONICAL: 'normalized_name',
  VARIANTS: ['player_details_name', 'schedule_team_name', 'short_name']
} as const;

function cellText(value: TableRow[string]): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

/**
 * Builds the variant → canonical lookup from reference rows
 *
 * Every non-blank variant maps to its row's canonical name, and the
 * canonical name maps to itself so resolving twice is a no-op. Rows
 * without a canonical name are ignored.
 */
export function buildTeamMapping(rows: readonly TableRow[]): TeamNameMapping {
  const mapping = new Map<string, CanonicalTeam>();
  for (const row of rows) {
    const canonical = cellText(row[TEAM_NAME_COLUMNS.CANONICAL]);
    if (!canonical.trim()) continue;

    for (const column of TEAM_NAME_COLUMNS.VARIANTS) {
      const variant = cellText(row[column]);
      if (variant.trim()) mapping.set(variant, canonical);
    }
    mapping.set(canonical, canonical);
  }
  return mapping;
}

/**
 * Resolves a label to its canonical team
 *
 * Exact match first, then the whitespace-trimmed label. Unknown labels come
 * back unchanged; with an empty mapping every label passes through.
 */
export function resolveTeam(name: string, mapping: TeamNameMapping): ResolveResult {
  if (mapping.size === 0) return { team: name, outcome: 'unmapped' };

  const exact = mapping.get(name);
  if (exact !== undefined) return { team: exact, outcome: 'exact' };

  const trimmed = mapping.get(name.trim());
  if (trimmed !== undefined) return { team: trimmed, outcome: 'trimmed' };

  return { team: name, outcome: 'miss' };
}

export type TeamResolver = (name: string) => CanonicalTeam;

/**
 * Wraps {@link resolveTeam} with audit logging
 *
 * Logs every resolution that changed the label, and every miss.
 */
export function createTeamResolver(mapping: TeamNameMapping, logger: Logger): TeamResolver {
  return (name: string) => {
    const { team, outcome } = resolveTeam(name, mapping);
    if (outcome === 'miss') {
      logger.warn({ team: name }, 'No mapping found for team');
    } else if (team !== name) {
      logger.info({ from: name, to: team }, 'Normalized team name');
    }
    return team;
  };
}

/**
 * Loads the reference table and builds the mapping
 *
 * A missing, unreadable or malformed table degrades to an empty mapping
 * (identity resolution for the run) with a warning.
 */
export async function loadTeamMapping(store: TableStore, filePath: string, logger: Logger): Promise<TeamNameMapping> {
  let rows: TableRow[] | null;
  try {
    rows = await store.load(filePath);
  } catch (err) {
    logger.warn({ err, filePath }, 'Error loading team mapping, continuing without team name normalization');
    return new Map();
  }

  if (rows === null) {
    logger.warn({ filePath }, 'Team mapping file not found, continuing without team name normalization');
    return new Map();
  }
  if (rows.length > 0 && !(TEAM_NAME_COLUMNS.CANONICAL in rows[0])) {
    logger.warn({ filePath, column: TEAM_NAME_COLUMNS.CANONICAL }, 'Team mapping table is missing its canonical column');
    return new Map();
  }

  const mapping = buildTeamMapping(rows);
  logger.info({ teams: rows.length, variations: mapping.size }, 'Loaded team mapping');
  return mapping;
}
