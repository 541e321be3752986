/**
 * Ranking
 *
 * Competition ranking with the minimum method: tied values share the best
 * rank they cover and the next distinct value skips accordingly.
 */

export type RankOrder = 'higher-is-better' | 'lower-is-better';

/**
 * Ranks a column of values
 *
 * Missing values get no rank and do not push other values down.
 *
 * @example
 * rankMin([90, 90, 85], 'higher-is-better') // [1, 1, 3]
 * rankMin([12, null, 9], 'lower-is-better') // [2, null, 1]
 */
export function rankMin(values: ReadonlyArray<number | null>, order: RankOrder): Array<number | null> {
  const present = values.filter((v): v is number => v !== null);
  const beats = order === 'higher-is-better'
    ? (other: number, value: number) => other > value
    : (other: number, value: number) => other < value;

  return values.map(value => {
    if (value === null) return null;
    return 1 + present.filter(other => beats(other, value)).length;
  });
}
