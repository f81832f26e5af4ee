import crypto from "crypto";

/**
 * Deterministic stream of uniform values in [0, 1) derived from a seed.
 * Each 32-bit word comes from SHA-256 over `${seed}:${block}`.
 */
function seededRandom(seed: string): () => number {
  let block = 0;
  let words: number[] = [];

  return () => {
    if (!words.length) {
      const digest = crypto
        .createHash("sha256")
        .update(`${seed}:${block++}`)
        .digest();
      words = [];
      for (let i = 0; i < digest.length; i += 4) {
        words.push(digest.readUInt32BE(i));
      }
    }
    const next = words.shift() ?? 0;
    return next / 2 ** 32;
  };
}

/**
 * Fisher-Yates shuffle driven by a seeded generator.
 * The same seed and input always produce the same order; `items` is left untouched.
 */
export function seededPermutation<T>(items: readonly T[], seed: string): T[] {
  const shuffled = [...items];
  const random = seededRandom(seed);
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/** Seed for an attempt's presentation order. */
export const attemptSeed = (attemptId: number): string => `attempt:${attemptId}`;
