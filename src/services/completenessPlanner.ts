/**
 * Entity Completeness Planner
 *
 * Decides which entities need their detail page fetched again and which
 * can be served from the persisted tables.
 */

import { SCHEDULE_COLUMNS } from '../core/constants.js';
import type { TableRow } from '../store/tableStore.js';
import { normalizeGameId } from '../util/gameId.js';
import { isBlank } from '../util/validation.js';

export type FetchReason =
  | 'new'
  | 'missing DOB'
  | 'missing height'
  | 'missing number'
  | 'no history'
  | 'complete';

export interface FetchDecision {
  fetch: boolean;
  reason: FetchReason;
}

/** Player detail table columns */
export const DETAIL_COLUMNS = {
  NAME: 'Name',
  TEAM: 'Team',
  DOB: 'Date Of Birth',
  HEIGHT: 'Height',
  NUMBER: 'Number',
} as const;

/** Columns of the history table that are not season entries */
export const HISTORY_BIO_COLUMNS: readonly string[] = ['Name', 'Current Team', 'Date Of Birth', 'Height', 'Number'];

/**
 * True when the history row holds at least one non-blank season entry
 */
export function hasAnyHistory(historyRecord: TableRow | undefined): boolean {
  if (!historyRecord) return false;
  return Object.entries(historyRecord).some(
    ([column, value]) => !HISTORY_BIO_COLUMNS.includes(column) && !isBlank(value)
  );
}

/**
 * Decides whether a player's page must be fetched
 *
 * Rules run in order and the first match wins: bio completeness is checked
 * before history, so a complete bio with an empty history still fetches.
 *
 * @param _entityKey - Player display name (kept for logging by callers)
 * @param existingDetail - Persisted detail row, if any
 * @param existingHistory - Persisted history row, if any
 */
export function needsDetailFetch(
  _entityKey: string,
  existingDetail: TableRow | undefined,
  existingHistory: TableRow | undefined
): FetchDecision {
  if (!existingDetail) return { fetch: true, reason: 'new' };
  if (isBlank(existingDetail[DETAIL_COLUMNS.DOB])) return { fetch: true, reason: 'missing DOB' };
  if (isBlank(existingDetail[DETAIL_COLUMNS.HEIGHT])) return { fetch: true, reason: 'missing height' };
  if (isBlank(existingDetail[DETAIL_COLUMNS.NUMBER])) return { fetch: true, reason: 'missing number' };
  if (!hasAnyHistory(existingHistory)) return { fetch: true, reason: 'no history' };
  return { fetch: false, reason: 'complete' };
}

/**
 * A scheduled game counts as completed once its score has been recorded
 */
export function isCompletedGame(row: TableRow): boolean {
  return !isBlank(row[SCHEDULE_COLUMNS.HOME_SCORE]);
}

/**
 * Completed games that are not yet in the persisted quarter table
 *
 * @param schedule - Schedule rows
 * @param existingIds - Game ids already present in the quarter table
 * @returns Game ids to fetch, in schedule order, without duplicates
 */
export function needsGameFetch(schedule: readonly TableRow[], existingIds: ReadonlySet<string>): string[] {
  const pending: string[] = [];
  const queued = new Set<string>();
  for (const row of schedule) {
    if (!isCompletedGame(row)) continue;
    const gameId = normalizeGameId(row[SCHEDULE_COLUMNS.CODE]);
    if (gameId === null || existingIds.has(gameId) || queued.has(gameId)) continue;
    queued.add(gameId);
    pending.push(gameId);
  }
  return pending;
}
