import { type PieceId } from "../types";

/**
 * Immutable piece generator: drawing never changes the instance, it hands
 * back the generator to draw from next.
 */
export type PieceRandomGenerator = {
  getNextPiece(): {
    piece: PieceId;
    newRng: PieceRandomGenerator;
  };
};

/**
 * The piece-supply callback the state machine draws upcoming shapes from.
 * It is the only source of nondeterminism the engine sees.
 */
export type PieceSupply = () => PieceId;

/**
 * Adapt an immutable generator into a supply callback. The callback owns the
 * advancing generator state; each call yields the next piece.
 */
export function toPieceSupply(rng: PieceRandomGenerator): PieceSupply {
  let current = rng;
  return () => {
    const result = current.getNextPiece();
    current = result.newRng;
    return result.piece;
  };
}
