/** Uniform source in [0, 1). Injected everywhere randomness is used. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export function randomInt(random: RandomSource, exclusiveMax: number): number {
  return Math.min(exclusiveMax - 1, Math.floor(random() * exclusiveMax));
}

export function randomInRange(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

export function pick<T>(items: readonly T[], random: RandomSource): T {
  return items[randomInt(random, items.length)];
}
