import { INPUTS, type Input } from "@/engine/commands";
import { boardToRows } from "@/engine/core/board";
import { isValidPosition } from "@/engine/core/collision";
import { toPieceSupply } from "@/engine/core/rng/interface";
import { createSevenBagRng } from "@/engine/core/rng/seeded";
import { sequenceSupply } from "@/engine/core/rng/sequence";
import { update } from "@/engine/step/update";
import { type GameState, type PieceId, createInitialState } from "@/engine/types";

import {
  applyInputs,
  boardWithBottom,
  repeat,
  testRules,
} from "../../test-helpers";

const EMPTY_ROW = "..........";

function oStackGame(): GameState {
  return createInitialState("O", "O", 10, 20);
}

describe("@/engine/step/update — scenarios", () => {
  test("18 ticks drop an O to the floor, lock it and spawn the preview", () => {
    const start = createInitialState("O", "T", 10, 20);
    const afterFall = applyInputs(start, repeat<Input>("Tick", 17), sequenceSupply("I"));

    expect(afterFall.active.pivot).toEqual({ x: 5, y: 18 });
    expect(afterFall.active.shape).toBe("O");

    const locked = update(afterFall, "Tick", sequenceSupply("I"), testRules);
    const rows = boardToRows(locked.board);

    expect(rows[18]).toBe(".....OO...");
    expect(rows[19]).toBe(".....OO...");
    expect(locked.active).toEqual({ pivot: { x: 5, y: 1 }, rotation: 0, shape: "T" });
    expect(locked.next).toBe("I");
    expect(locked.score).toBe(0);
    expect(locked.status).toBe("Playing");
  });

  test("hard-dropping an I into a gap clears the row and scores drop bonus", () => {
    const start: GameState = {
      ...createInitialState("I", "T", 10, 20),
      board: boardWithBottom(10, 20, ["JJJJ....JJ"]),
    };
    const result = update(start, "HardDrop", sequenceSupply("S"), testRules);

    // 18 rows dropped at 2 points each, plus a single at level 1
    expect(result.score).toBe(36 + 100);
    expect(result.linesCleared).toBe(1);
    expect(result.level).toBe(1);
    expect(boardToRows(result.board)).toEqual(repeat(EMPTY_ROW, 20));
    expect(result.active.shape).toBe("T");
    expect(result.next).toBe("S");
  });

  test("pause freezes the piece until unpaused", () => {
    const moving = applyInputs(
      createInitialState("T", "O", 10, 20),
      ["Tick", "Tick", "Tick"],
      sequenceSupply("I"),
    );
    const paused = update(moving, "Pause", sequenceSupply("I"), testRules);
    const ticked = update(paused, "Tick", sequenceSupply("I"), testRules);
    const resumed = update(ticked, "Pause", sequenceSupply("I"), testRules);

    expect(paused.status).toBe("Paused");
    expect(ticked).toBe(paused);
    expect(resumed.status).toBe("Playing");
    expect(resumed.active).toEqual(moving.active);
    expect(resumed.active.pivot).toEqual({ x: 5, y: 4 });
  });
});

describe("@/engine/step/update — movement and rotation", () => {
  test("lateral moves stop at the walls without error", () => {
    const supply = sequenceSupply("I");
    const atLeft = applyInputs(oStackGame(), repeat<Input>("MoveLeft", 5), supply);

    expect(atLeft.active.pivot.x).toBe(0);
    expect(update(atLeft, "MoveLeft", supply, testRules)).toBe(atLeft);

    const atRight = applyInputs(oStackGame(), repeat<Input>("MoveRight", 3), supply);
    expect(atRight.active.pivot.x).toBe(8);
    expect(update(atRight, "MoveRight", supply, testRules)).toBe(atRight);
  });

  test("rotations turn the piece in place when there is room", () => {
    const start = createInitialState("T", "O", 10, 20);
    const cw = update(start, "RotateClockwise", sequenceSupply("I"), testRules);
    const ccw = update(start, "RotateCounterClockwise", sequenceSupply("I"), testRules);

    expect(cw.active).toEqual({ pivot: { x: 5, y: 1 }, rotation: 90, shape: "T" });
    expect(ccw.active).toEqual({ pivot: { x: 5, y: 1 }, rotation: 270, shape: "T" });
  });

  test("MoveDown descends one row", () => {
    const next = update(oStackGame(), "MoveDown", sequenceSupply("I"), testRules);

    expect(next.active.pivot).toEqual({ x: 5, y: 2 });
  });

  test("Quit while playing changes nothing", () => {
    const start = oStackGame();

    expect(update(start, "Quit", sequenceSupply("I"), testRules)).toBe(start);
  });

  test("the supply is called only when a piece locks", () => {
    const supply = jest.fn<PieceId, []>(() => "S");
    const moved = applyInputs(oStackGame(), ["MoveDown", "MoveLeft", "RotateClockwise", "Tick"], supply);

    expect(supply).not.toHaveBeenCalled();

    update(moved, "HardDrop", supply, testRules);
    expect(supply).toHaveBeenCalledTimes(1);
  });
});

describe("@/engine/step/update — locking and game over", () => {
  test("clearing the tenth line raises the level after scoring at the old one", () => {
    const start: GameState = {
      ...createInitialState("I", "T", 10, 20),
      board: boardWithBottom(10, 20, ["JJJJ....JJ"]),
      linesCleared: 9,
    };
    const result = update(start, "HardDrop", sequenceSupply("S"), testRules);

    expect(result.linesCleared).toBe(10);
    expect(result.level).toBe(2);
    expect(result.score).toBe(136);
  });

  test("nine stacked O pieces fill the spawn area and end the game", () => {
    const before = applyInputs(oStackGame(), repeat<Input>("Tick", 89), sequenceSupply("O"));
    expect(before.status).toBe("Playing");
    expect(before.active.pivot).toEqual({ x: 5, y: 2 });

    const over = update(before, "Tick", sequenceSupply("O"), testRules);
    const rows = boardToRows(over.board);

    expect(over.status).toBe("GameOver");
    expect(over.score).toBe(0);
    expect(over.linesCleared).toBe(0);
    expect(rows.slice(0, 2)).toEqual([EMPTY_ROW, EMPTY_ROW]);
    expect(rows.slice(2)).toEqual(repeat(".....OO...", 18));
    // The lock's board is kept; the pieces stay as they were
    expect(over.active).toEqual(before.active);
    expect(over.next).toBe("O");
  });

  test("every input on a finished game returns the same state", () => {
    const over = applyInputs(oStackGame(), repeat<Input>("Tick", 90), sequenceSupply("O"));
    expect(over.status).toBe("GameOver");

    for (const input of INPUTS) {
      expect(update(over, input, sequenceSupply("I"), testRules)).toBe(over);
    }
  });

  test("only Pause is accepted while paused", () => {
    const paused = update(oStackGame(), "Pause", sequenceSupply("I"), testRules);

    for (const input of INPUTS.filter((i) => i !== "Pause")) {
      expect(update(paused, input, sequenceSupply("I"), testRules)).toBe(paused);
    }
  });
});

describe("@/engine/step/update — invariants over a long run", () => {
  // Small LCG so the input sequence is fixed
  function inputSequence(length: number): Array<Input> {
    const pool = INPUTS.filter((i) => i !== "Quit");
    const out: Array<Input> = [];
    let seed = 12345;
    for (let i = 0; i < length; i++) {
      seed = (seed * 16807) % 2147483647;
      const input = pool[seed % pool.length];
      if (input !== undefined) out.push(input);
    }
    return out;
  }

  test("dimensions hold, counters never decrease and the active piece stays valid", () => {
    const supply = toPieceSupply(createSevenBagRng("invariants"));
    let state = createInitialState("T", "L", 10, 20);

    for (const input of inputSequence(600)) {
      const next = update(state, input, supply, testRules);

      expect(next.board.width).toBe(10);
      expect(next.board.height).toBe(20);
      expect(next.board.rows.every((r) => r.length === 10)).toBe(true);
      expect(next.score).toBeGreaterThanOrEqual(state.score);
      expect(next.level).toBeGreaterThanOrEqual(state.level);
      expect(next.linesCleared).toBeGreaterThanOrEqual(state.linesCleared);
      if (state.status === "GameOver") expect(next).toBe(state);
      if (next.status !== "GameOver") {
        expect(isValidPosition(next.active, next.board)).toBe(true);
      }
      state = next;
    }
  });
});
