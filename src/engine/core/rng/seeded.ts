import { PIECE_IDS, type PieceId } from "../types";

import { type PieceRandomGenerator } from "./interface";

// Seedable generator state shared by the bag and uniform generators
export type SevenBagState = Readonly<{
  seed: string;
  currentBag: ReadonlyArray<PieceId>;
  bagIndex: number;
  internalSeed: number;
}>;

// Create initial bag state
export function createBagState(seed = "default"): SevenBagState {
  return {
    bagIndex: 0,
    currentBag: [],
    internalSeed: hashString(seed),
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

// Map the high bits of a 32-bit state into [0, bound)
function toIndex(state: number, bound: number): number {
  return Math.floor(((state >>> 0) / 4294967296) * bound);
}

// Shuffle array using Fisher-Yates algorithm
function shuffle<T>(
  array: ReadonlyArray<T>,
  seed: number,
): { shuffled: Array<T>; nextSeed: number } {
  const result = [...array];
  let currentSeed = seed;

  for (let i = result.length - 1; i > 0; i--) {
    currentSeed = nextRandom(currentSeed);
    const j = toIndex(currentSeed, i + 1);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }

  return { nextSeed: currentSeed, shuffled: result };
}

// Get next piece from the 7-bag
export function drawFromBag(state: SevenBagState): {
  piece: PieceId;
  newState: SevenBagState;
} {
  let currentBag = state.currentBag;
  let bagIndex = state.bagIndex;
  let internalSeed = state.internalSeed;

  // If we've exhausted the current bag, create a new one
  if (bagIndex >= currentBag.length) {
    const shuffleResult = shuffle(PIECE_IDS, internalSeed);
    currentBag = shuffleResult.shuffled;
    internalSeed = shuffleResult.nextSeed;
    bagIndex = 0;
  }

  const piece = currentBag[bagIndex];
  if (piece === undefined) {
    throw new Error("Bag is empty or corrupted");
  }

  return {
    newState: { ...state, bagIndex: bagIndex + 1, currentBag, internalSeed },
    piece,
  };
}

/**
 * Each run of seven draws contains every shape exactly once.
 */
export class SevenBagRng implements PieceRandomGenerator {
  constructor(private readonly state: SevenBagState) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const result = drawFromBag(this.state);
    return { newRng: new SevenBagRng(result.newState), piece: result.piece };
  }
}

/**
 * Independent uniform draws over the seven shapes; repeats are allowed.
 */
export class UniformRng implements PieceRandomGenerator {
  constructor(private readonly internalSeed: number) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const next = nextRandom(this.internalSeed);
    const piece = PIECE_IDS[toIndex(next, PIECE_IDS.length)];
    if (piece === undefined) throw new Error("Random index out of range");
    return { newRng: new UniformRng(next), piece };
  }
}

export function createSevenBagRng(seed = "default"): PieceRandomGenerator {
  return new SevenBagRng(createBagState(seed));
}

export function createUniformRng(seed = "default"): PieceRandomGenerator {
  return new UniformRng(hashString(seed));
}
