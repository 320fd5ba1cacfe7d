/**
 * Bet level helpers. Bets are whole units (multiples of the base bet).
 */

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Rounds to integers, drops non-positive and non-finite entries, removes
 * duplicates and sorts ascending.
 */
export function normalizeBetLevels(levels: readonly number[]): number[] {
  const unique = new Set<number>();
  for (const level of levels) {
    if (!Number.isFinite(level)) continue;
    const rounded = Math.round(level);
    if (rounded > 0) unique.add(rounded);
  }
  return [...unique].sort((a, b) => a - b);
}

/**
 * Next level strictly above `current`, or undefined at the top.
 */
export function getNextBetLevel(levels: readonly number[], current: number): number | undefined {
  return levels.find((level) => level > current);
}

/**
 * Previous level strictly below `current`, or undefined at the bottom.
 */
export function getPreviousBetLevel(levels: readonly number[], current: number): number | undefined {
  for (let i = levels.length - 1; i >= 0; i--) {
    if (levels[i] < current) return levels[i];
  }
  return undefined;
}

/**
 * Greatest level ≤ value; the first level when value is below all of them.
 */
export function snapToBetLevel(levels: readonly number[], value: number): number {
  const below = levels.filter((level) => level <= value);
  return below.length > 0 ? below[below.length - 1] : levels[0];
}
