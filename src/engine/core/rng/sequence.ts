import { type PieceId } from "../types";

import { type PieceRandomGenerator, type PieceSupply, toPieceSupply } from "./interface";

// Cycles through a fixed list of shapes, starting over after the last one
export class SequenceRng implements PieceRandomGenerator {
  constructor(
    private readonly shapes: ReadonlyArray<PieceId>,
    private readonly position = 0,
  ) {
    if (shapes.length === 0) throw new Error("Sequence must not be empty");
  }

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const piece = this.shapes[this.position];
    if (piece === undefined) throw new Error("Sequence position out of range");
    const following = (this.position + 1) % this.shapes.length;
    return { newRng: new SequenceRng(this.shapes, following), piece };
  }
}

// Scripted supply for scenarios that need a known order of shapes
export function sequenceSupply(...shapes: ReadonlyArray<PieceId>): PieceSupply {
  return toPieceSupply(new SequenceRng(shapes));
}
