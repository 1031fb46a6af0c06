/**
 * Seeded pseudo-random source
 *
 * Every sampling step takes an explicit Rng so that focal-node passes are
 * reproducible and never share state.
 *
 * @module utils/random
 */

/** Returns a float in [0, 1) */
export type Rng = () => number;

export type SeedValue = number | string;

// ── mulberry32 ──────────────────────────────────────────────────────

export function mulberry32(seed: number): Rng {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** 32-bit FNV-1a, used to turn string seeds into mulberry32 seeds */
export function hashSeed(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function createRng(seed: SeedValue): Rng {
  return mulberry32(typeof seed === 'number' ? seed : hashSeed(seed));
}

/**
 * Independent stream for one labeled task (a focal node, an update slot),
 * derived only from the parent seed and the label.
 */
export function forkRng(seed: SeedValue, label: string): Rng {
  return createRng(`${seed}:${label}`);
}

// ── Sampling helpers ────────────────────────────────────────────────

export function randInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/** Fisher-Yates shuffle into a new array */
export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/** Uniform sample without replacement */
export function pickN<T>(rng: Rng, items: readonly T[], n: number): T[] {
  return shuffle(rng, items).slice(0, Math.max(0, n));
}

/**
 * Sample `n` indices without replacement and return them ascending, so the
 * caller can keep its own enumeration order.
 */
export function sampleIndices(rng: Rng, length: number, n: number): number[] {
  const indices = Array.from({ length }, (_, i) => i);
  return pickN(rng, indices, n).sort((a, b) => a - b);
}

/** Short lowercase base-36 token */
export function randomToken(rng: Rng, length: number = 6): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += Math.floor(rng() * 36).toString(36);
  }
  return token;
}
