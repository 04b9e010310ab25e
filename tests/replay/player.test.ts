import { type Input } from "@/engine/commands";
import { toPieceSupply } from "@/engine/core/rng/interface";
import { createSevenBagRng } from "@/engine/core/rng/seeded";
import { sequenceSupply } from "@/engine/core/rng/sequence";
import { type GameRules, createInitialState } from "@/engine/types";
import {
  advancePlayback,
  initializePlayback,
  playToEnd,
  playbackProgress,
} from "@/replay/player";
import { type ReplayData, type ReplayEvent } from "@/replay/types";
import { createFrame, frameAsNumber } from "@/types/brands";

import { recordGame, repeat, testRules } from "../test-helpers";

function replayOf(
  firstShape: "I" | "O" | "T",
  secondShape: "I" | "O" | "T",
  events: ReadonlyArray<ReplayEvent>,
  startLevel = 1,
): ReplayData {
  return {
    events,
    metadata: {
      boardHeight: 20,
      boardWidth: 10,
      durationMs: 0,
      finalLevel: 1,
      finalLines: 0,
      finalScore: 0,
      firstShape,
      secondShape,
      startLevel,
      startTimestamp: 0,
      version: "1.0",
    },
  };
}

function input(frame: number, value: Input): ReplayEvent {
  return { frame: createFrame(frame), input: value, kind: "PlayerInput" };
}

describe("@/replay/player — initializePlayback", () => {
  test("rebuilds the starting state from the metadata", () => {
    const playback = initializePlayback(replayOf("T", "I", [input(0, "Tick")]));

    expect(playback.gameState).toEqual(createInitialState("T", "I", 10, 20));
    expect(frameAsNumber(playback.currentFrame)).toBe(0);
    expect(playback.isFinished).toBe(false);
    expect(playbackProgress(playback)).toBe(0);
  });

  test("starts at the recorded level, not the one in the current rules", () => {
    const playback = initializePlayback(replayOf("T", "I", [input(0, "Tick")], 3));

    expect(playback.gameState.level).toBe(3);
  });

  test("an empty log is finished from the start", () => {
    const playback = initializePlayback(replayOf("T", "I", []));

    expect(playback.isFinished).toBe(true);
    expect(playbackProgress(playback)).toBe(1);
    expect(advancePlayback(playback, testRules)).toBe(playback);
  });
});

describe("@/replay/player — advancePlayback", () => {
  test("applies only the events of the current frame", () => {
    const replay = replayOf("T", "I", [
      input(0, "MoveLeft"),
      input(0, "MoveLeft"),
      input(3, "MoveDown"),
    ]);
    const f0 = advancePlayback(initializePlayback(replay), testRules);

    expect(f0.gameState.active.pivot).toEqual({ x: 3, y: 1 });
    expect(f0.eventIndex).toBe(2);
    expect(playbackProgress(f0)).toBeCloseTo(2 / 3);

    const f2 = advancePlayback(advancePlayback(f0, testRules), testRules);
    expect(f2.gameState).toBe(f0.gameState);
    expect(frameAsNumber(f2.currentFrame)).toBe(3);

    const f3 = advancePlayback(f2, testRules);
    expect(f3.gameState.active.pivot).toEqual({ x: 3, y: 2 });
    expect(f3.isFinished).toBe(true);
    expect(playbackProgress(f3)).toBe(1);
  });

  test("a logged spawn supplies the shape drawn by the next lock", () => {
    const replay = replayOf("I", "T", [
      { frame: createFrame(0), kind: "PieceSpawn", shape: "Z" },
      input(0, "HardDrop"),
    ]);
    const after = advancePlayback(initializePlayback(replay), testRules);

    expect(after.gameState.active.shape).toBe("T");
    expect(after.gameState.next).toBe("Z");
    expect(after.gameState.score).toBe(36);
    expect(after.pendingShapes).toEqual([]);
  });

  test("stops at game over even when events remain", () => {
    const events = repeat<Input>("Tick", 95).map((value, i) => input(i, value));
    let playback = initializePlayback(replayOf("O", "O", events));
    while (!playback.isFinished) {
      playback = advancePlayback(playback, testRules);
    }

    expect(playback.gameState.status).toBe("GameOver");
    expect(playback.eventIndex).toBe(90);
    expect(playbackProgress(playback)).toBeCloseTo(90 / 95);
  });
});

describe("@/replay/player — playToEnd", () => {
  test("reproduces a recorded game exactly", () => {
    const pattern: ReadonlyArray<Input> = [
      "MoveLeft",
      "RotateClockwise",
      "HardDrop",
      "MoveRight",
      "MoveRight",
      "Tick",
      "Pause",
      "Tick",
      "Pause",
      "RotateCounterClockwise",
      "HardDrop",
      "Tick",
    ];
    const inputs = Array.from({ length: 25 }, () => pattern).flat();
    const supply = toPieceSupply(createSevenBagRng("replay"));
    const recorded = recordGame(createInitialState(supply(), supply(), 10, 20), inputs, supply);

    expect(playToEnd(recorded.replay, testRules)).toEqual(recorded.state);
  });

  test("reproduces a game recorded under a different start level", () => {
    const levelThree: GameRules = { ...testRules, startLevel: 3 };
    const recorded = recordGame(
      createInitialState("O", "O", 10, 20, 3),
      repeat<Input>("Tick", 40),
      sequenceSupply("O"),
      levelThree,
    );

    expect(recorded.replay.metadata.startLevel).toBe(3);
    expect(recorded.state.level).toBe(3);
    expect(playToEnd(recorded.replay, testRules)).toEqual(recorded.state);
  });

  test("reproduces a game that ended", () => {
    const recorded = recordGame(
      createInitialState("O", "O", 10, 20),
      repeat<Input>("Tick", 200),
      sequenceSupply("O"),
    );

    expect(recorded.state.status).toBe("GameOver");
    // 90 inputs and one spawn per lock
    expect(recorded.replay.events).toHaveLength(99);
    expect(playToEnd(recorded.replay, testRules)).toEqual(recorded.state);
  });
});
