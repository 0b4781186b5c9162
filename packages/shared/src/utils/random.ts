/**
 * Random number helpers for the simulated analysis.
 * A seeded source makes a whole report reproducible.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

/**
 * mulberry32: small 32-bit PRNG, good enough for demo values
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? Math.random : seededRandom(seed);
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  // Guard against a source that returns exactly 1
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/**
 * Round to `decimals` places using the exact binary value of `value`:
 * 0.35 is stored just below 0.35 and rounds down, true ties go to the even digit.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  // toFixed is exact, so the extra digits expose what lies past the rounding digit
  const [whole, fraction = ''] = Math.abs(value).toFixed(decimals + 25).split('.');
  const kept = fraction.slice(0, decimals);
  const rest = fraction.slice(decimals);
  const truncated = Number(`${whole}.${kept}`);
  const lastDigit = Number(`${whole}${kept}`.slice(-1));

  const roundUp = rest[0] > '5'
    || (rest[0] === '5' && (/[1-9]/.test(rest.slice(1)) || lastDigit % 2 === 1));
  const magnitude = roundUp ? Number((truncated + 10 ** -decimals).toFixed(decimals)) : truncated;

  return value < 0 ? -magnitude : magnitude;
}
