import { handleInput } from "../engine";
import { dropInterval } from "../engine/scoring/line-clear";
import { ReplayRecorder } from "../replay/recorder";
import { type ReplayData } from "../replay/types";
import { debugLog } from "../utils/debug";

import { type Sleep, runTickProducer, sleep } from "./clock";
import { commandToInput, type GameCommand } from "./commands";
import { type InputTimings, runInputProducer } from "./input-stream";
import { IntervalCell } from "./interval-cell";
import { BoundedQueue, DEFAULT_QUEUE_CAPACITY } from "./queue";

import type { GameRules, GameState, PieceSupply } from "../engine/types";
import type { KeySource } from "../input/key-source";

export type RenderHook = (state: GameState) => void;

export type SessionOptions = Readonly<{
  initialState: GameState;
  rules: GameRules;
  supply: PieceSupply;
  source: KeySource;
  timings: InputTimings;
  queueCapacity?: number;
  render?: RenderHook;
  // Capture a replay of every consumed command
  record?: boolean;
  now?: () => number;
  sleep?: Sleep;
}>;

export type SessionResult = Readonly<{
  state: GameState;
  replay: ReplayData | null;
}>;

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Run one interactive game. Keyboard and timer producers feed a bounded
 * queue; this function is the only consumer and the only writer of game
 * state. It returns on Quit or GameOver after both producers have stopped.
 */
export async function runSession(options: SessionOptions): Promise<SessionResult> {
  const { rules, supply, render } = options;
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const queue = new BoundedQueue<GameCommand>(
    options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
  );
  const interval = new IntervalCell(
    dropInterval(options.initialState.level, rules.speed),
  );
  const controller = new AbortController();
  const { signal } = controller;

  // A producer that fails takes the session down with its error
  const closeOnFailure = (e: unknown): void => {
    if (signal.aborted) return;
    debugLog("session", "producer failed", e);
    queue.close(toError(e));
  };

  const producers = Promise.all([
    runInputProducer(queue, options.source, {
      ...options.timings,
      signal,
      sleep: wait,
    }).catch(closeOnFailure),
    runTickProducer(queue, interval, { signal, sleep: wait }).catch(
      closeOnFailure,
    ),
  ]);

  let state = options.initialState;
  let recorder =
    options.record === true
      ? ReplayRecorder.create({
          boardHeight: state.board.height,
          boardWidth: state.board.width,
          firstShape: state.active.shape,
          secondShape: state.next,
          startLevel: state.level,
          startTimestamp: now(),
        })
      : null;

  render?.(state);
  try {
    for (;;) {
      const input = commandToInput(await queue.take());
      if (input === null) {
        debugLog("session", "quit requested");
        break;
      }

      const outcome = handleInput(state, input, supply, rules);
      recorder = recorder?.recordStep(input, outcome.spawned) ?? null;
      if (outcome.nextIntervalMs !== null) interval.set(outcome.nextIntervalMs);
      state = outcome.state;
      render?.(state);

      if (!outcome.shouldContinue) {
        debugLog(
          "session",
          `game over - score ${String(state.score)}, lines ${String(state.linesCleared)}, level ${String(state.level)}`,
        );
        break;
      }
    }
  } finally {
    controller.abort();
    queue.close();
    await producers;
  }

  return { replay: recorder?.build(state, now()) ?? null, state };
}
