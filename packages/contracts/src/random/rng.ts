/**
 * Helpers that turn any `() => number` stream in [0, 1) into the integer,
 * choice and shuffle draws used by the generator.
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Number stream returning values in [0, 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random element of an array.
 * Returns undefined only for an empty array.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const left = result[i];
    const right = result[j];
    if (left === undefined || right === undefined) continue;
    result[i] = right;
    result[j] = left;
  }
  return result;
}

/**
 * True with the given chance (0 to 1)
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
