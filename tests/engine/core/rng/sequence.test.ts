// Tests for @/engine/core/rng/sequence.ts
import {
  type PieceRandomGenerator,
  toPieceSupply,
} from "@/engine/core/rng/interface";
import { SequenceRng, sequenceSupply } from "@/engine/core/rng/sequence";
import { type PieceId } from "@/engine/core/types";

describe("@/engine/core/rng/sequence — cycling sequence", () => {
  test("Throws on empty sequence", () => {
    const emptySequence: Array<PieceId> = [];

    expect(() => new SequenceRng(emptySequence)).toThrow(
      "Sequence must not be empty",
    );
  });

  test("Yields the sequence in order, then wraps around", () => {
    let rng: PieceRandomGenerator = new SequenceRng(["I", "O", "T"]);
    const actual: Array<PieceId> = [];

    for (let i = 0; i < 6; i++) {
      const result = rng.getNextPiece();
      actual.push(result.piece);
      rng = result.newRng;
    }

    expect(actual).toEqual(["I", "O", "T", "I", "O", "T"]);
  });

  test("A generator can start partway through the sequence", () => {
    const supply = toPieceSupply(new SequenceRng(["S", "Z", "L"], 2));

    expect([supply(), supply(), supply()]).toEqual(["L", "S", "Z"]);
  });

  test("The generator itself is never advanced", () => {
    const rng = new SequenceRng(["J", "L"]);
    rng.getNextPiece();

    expect(rng.getNextPiece().piece).toBe("J");
  });
});

describe("@/engine/core/rng/interface — supply callback", () => {
  test("toPieceSupply advances on every call", () => {
    const supply = toPieceSupply(new SequenceRng(["T", "S"]));

    expect([supply(), supply(), supply()]).toEqual(["T", "S", "T"]);
  });
});

describe("@/engine/core/rng/sequence — scripted supply", () => {
  test("sequenceSupply repeats its shapes in order", () => {
    const supply = sequenceSupply("O", "I");

    expect([supply(), supply(), supply(), supply()]).toEqual(["O", "I", "O", "I"]);
  });

  test("A single shape is supplied forever", () => {
    const supply = sequenceSupply("T");

    expect([supply(), supply(), supply()]).toEqual(["T", "T", "T"]);
  });
});
