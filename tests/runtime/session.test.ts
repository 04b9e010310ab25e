import { sequenceSupply } from "@/engine/core/rng/sequence";
import { createInitialState } from "@/engine/types";
import { ArrayKeySource, type KeySource } from "@/input/key-source";
import { playToEnd } from "@/replay/player";
import { runSession } from "@/runtime/session";

import { fastSleep, testRules } from "../test-helpers";

const timings = {
  escapeSequenceSecondWaitMs: 1,
  escapeSequenceWaitMs: 1,
  pollIntervalMs: 1,
};

function bytes(text: string): Array<number> {
  return [...text].map((ch) => ch.charCodeAt(0));
}

describe("@/runtime/session — runSession", () => {
  test("quit ends the session without touching the game", async () => {
    const initialState = createInitialState("T", "O", 10, 20);
    const render = jest.fn();

    const result = await runSession({
      initialState,
      record: true,
      render,
      rules: testRules,
      sleep: fastSleep,
      source: new ArrayKeySource(bytes("q")),
      supply: sequenceSupply("I"),
      timings,
    });

    expect(result.state).toBe(initialState);
    expect(result.replay?.events).toEqual([]);
    expect(render).toHaveBeenCalledTimes(1);
  });

  test("ticks alone play a game to its end and record it", async () => {
    const initialState = createInitialState("O", "O", 10, 20);
    const render = jest.fn();
    const now = jest.fn<number, []>().mockReturnValueOnce(1000).mockReturnValueOnce(4000);

    const result = await runSession({
      initialState,
      now,
      record: true,
      render,
      rules: testRules,
      sleep: fastSleep,
      source: new ArrayKeySource([]),
      supply: sequenceSupply("O"),
      timings,
    });

    expect(result.state.status).toBe("GameOver");
    // Initial frame plus one per consumed tick
    expect(render).toHaveBeenCalledTimes(91);
    expect(result.replay?.events).toHaveLength(99);
    expect(result.replay?.metadata.durationMs).toBe(3000);
    expect(result.replay?.metadata.startTimestamp).toBe(1000);
  });

  test("the recorded replay reproduces a game mixing keys and ticks", async () => {
    const result = await runSession({
      initialState: createInitialState("T", "I", 10, 20),
      record: true,
      rules: testRules,
      sleep: fastSleep,
      source: new ArrayKeySource(bytes("hhk lll zj p p  hk ")),
      supply: sequenceSupply("O"),
      timings,
    });

    expect(result.replay).not.toBeNull();
    if (result.replay === null) return;
    expect(result.state.status).toBe("GameOver");
    expect(result.replay.metadata.finalScore).toBe(result.state.score);
    expect(playToEnd(result.replay, testRules)).toEqual(result.state);
  });

  test("without recording no replay comes back", async () => {
    const result = await runSession({
      initialState: createInitialState("T", "O", 10, 20),
      rules: testRules,
      sleep: fastSleep,
      source: new ArrayKeySource(bytes("q")),
      supply: sequenceSupply("I"),
      timings,
    });

    expect(result.replay).toBeNull();
  });

  test("a failing key source fails the session", async () => {
    const broken: KeySource = {
      available: () => 0,
      read: () => {
        throw new Error("keyboard unplugged");
      },
    };

    await expect(
      runSession({
        initialState: createInitialState("T", "O", 10, 20),
        rules: testRules,
        sleep: fastSleep,
        source: broken,
        supply: sequenceSupply("I"),
        timings,
      }),
    ).rejects.toThrow("keyboard unplugged");
  });
});
