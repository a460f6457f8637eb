import { ALL_PIECES } from "../pieces";

import { type PieceDraw, type PieceRandomGenerator } from "./interface";
import { type PieceId } from "../types";

// Seedable 7-bag state
export type SevenBagState = {
  readonly seed: string;
  readonly currentBag: ReadonlyArray<PieceId>;
  readonly bagIndex: number;
  readonly internalSeed: number;
};

// Create initial RNG state
export function createRngState(seed = "default"): SevenBagState {
  return {
    bagIndex: 0,
    currentBag: [],
    internalSeed: hashString(seed),
    seed,
  };
}

// String hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Linear Congruential Generator step
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

// Fisher-Yates shuffle driven by the LCG
function shuffle<T>(
  array: ReadonlyArray<T>,
  seed: number,
): { shuffled: Array<T>; nextSeed: number } {
  const result = [...array];
  let currentSeed = seed;

  for (let i = result.length - 1; i > 0; i--) {
    currentSeed = nextRandom(currentSeed);
    // High bits mapped to [0, i] to reduce modulo bias
    const j = Math.floor((currentSeed / 4294967296) * (i + 1));
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }

  return { nextSeed: currentSeed, shuffled: result };
}

// Get next piece from the 7-bag, opening a fresh bag when the current one is spent
export function drawFromBag(rng: SevenBagState): {
  piece: PieceId;
  newRng: SevenBagState;
} {
  let currentBag = rng.currentBag;
  let bagIndex = rng.bagIndex;
  let internalSeed = rng.internalSeed;

  if (bagIndex >= currentBag.length) {
    const shuffled = shuffle(ALL_PIECES, internalSeed);
    currentBag = shuffled.shuffled;
    internalSeed = shuffled.nextSeed;
    bagIndex = 0;
  }

  const piece = currentBag[bagIndex];
  if (piece === undefined) {
    throw new Error("Bag is empty or corrupted");
  }

  return {
    newRng: { ...rng, bagIndex: bagIndex + 1, currentBag, internalSeed },
    piece,
  };
}

/**
 * Seeded 7-bag generator. Each bag is a uniform permutation of all seven
 * pieces, consumed completely before the next bag is shuffled.
 */
export class SevenBagRng implements PieceRandomGenerator {
  constructor(private readonly state: SevenBagState) {}

  draw(count: number): PieceDraw {
    const pieces: Array<PieceId> = [];
    let current = this.state;
    for (let i = 0; i < count; i++) {
      const result = drawFromBag(current);
      pieces.push(result.piece);
      current = result.newRng;
    }
    return { pieces, rest: new SevenBagRng(current) };
  }

  getState(): SevenBagState {
    return this.state;
  }
}

export function createSevenBagRng(seed = "default"): PieceRandomGenerator {
  return new SevenBagRng(createRngState(seed));
}
