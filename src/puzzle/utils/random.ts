// Random helpers for scrambling

export type RandomFn = () => number;

/**
 * Deterministic generator in [0, 1) from a 32-bit linear congruential step.
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): RandomFn {
  let state = (Math.floor(seed) >>> 0) || 0x6d2b79f5;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function randomChoice<T>(random: RandomFn, arr: readonly T[]): T {
  return arr[Math.floor(random() * arr.length)];
}

// Fisher-Yates shuffle; returns a new array
export function shuffle<T>(random: RandomFn, items: readonly T[]): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const temp = shuffled[i];
    shuffled[i] = shuffled[j];
    shuffled[j] = temp;
  }
  return shuffled;
}
