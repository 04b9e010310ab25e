import { type PieceId } from "../engine/core/types";
import { update } from "../engine/step/update";
import { type GameRules, type GameState, createInitialState } from "../engine/types";
import { type Frame, createFrame, frameAsNumber, nextFrame } from "../types/brands";

import { type ReplayData, type ReplayEvent } from "./types";

export type PlaybackState = Readonly<{
  gameState: GameState;
  replay: ReplayData;
  currentFrame: Frame;
  eventIndex: number;
  // Shapes announced by PieceSpawn events; each PlayerInput takes the oldest
  pendingShapes: ReadonlyArray<PieceId>;
  isFinished: boolean;
}>;

// The starting state comes from the recording alone, not from current rules
export function initializePlayback(replay: ReplayData): PlaybackState {
  const { metadata } = replay;
  return {
    currentFrame: createFrame(0),
    eventIndex: 0,
    gameState: createInitialState(
      metadata.firstShape,
      metadata.secondShape,
      metadata.boardWidth,
      metadata.boardHeight,
      metadata.startLevel,
    ),
    isFinished: replay.events.length === 0,
    pendingShapes: [],
    replay,
  };
}

type FrameState = Readonly<{
  gameState: GameState;
  pendingShapes: ReadonlyArray<PieceId>;
}>;

function applyEvent(
  acc: FrameState,
  event: ReplayEvent,
  rules: GameRules,
): FrameState {
  switch (event.kind) {
    case "PieceSpawn":
      return { ...acc, pendingShapes: [...acc.pendingShapes, event.shape] };
    case "PlayerInput": {
      const [queued, ...rest] = acc.pendingShapes;
      const upcoming = queued ?? acc.gameState.next;
      return {
        gameState: update(acc.gameState, event.input, () => upcoming, rules),
        pendingShapes: rest,
      };
    }
  }
}

/**
 * Apply every event stamped with the current frame, then move to the next
 * frame. Finished playback is returned unchanged. Levels count from the
 * recorded start level whatever `rules.startLevel` says.
 */
export function advancePlayback(
  state: PlaybackState,
  rules: GameRules,
): PlaybackState {
  if (state.isFinished) return state;

  const { events, metadata } = state.replay;
  const recordedRules: GameRules = { ...rules, startLevel: metadata.startLevel };
  const frame = frameAsNumber(state.currentFrame);
  let index = state.eventIndex;
  let acc: FrameState = {
    gameState: state.gameState,
    pendingShapes: state.pendingShapes,
  };

  for (let event = events[index]; event !== undefined; event = events[index]) {
    if (frameAsNumber(event.frame) > frame) break;
    acc = applyEvent(acc, event, recordedRules);
    index++;
  }

  return {
    ...state,
    currentFrame: nextFrame(state.currentFrame),
    eventIndex: index,
    gameState: acc.gameState,
    isFinished: index >= events.length || acc.gameState.status === "GameOver",
    pendingShapes: acc.pendingShapes,
  };
}

// Fraction of events consumed, in [0, 1]; an empty log counts as complete
export function playbackProgress(state: PlaybackState): number {
  const total = state.replay.events.length;
  if (total === 0) return 1;
  return state.eventIndex / total;
}

// Run playback without pacing and return the final game state
export function playToEnd(replay: ReplayData, rules: GameRules): GameState {
  let state = initializePlayback(replay);
  while (!state.isFinished) {
    state = advancePlayback(state, rules);
  }
  return state.gameState;
}
