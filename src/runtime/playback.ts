import {
  advancePlayback,
  initializePlayback,
  type PlaybackState,
} from "../replay/player";
import { type ReplayData } from "../replay/types";
import { debugLog } from "../utils/debug";

import { type Sleep, sleep } from "./clock";

import type { GameRules } from "../engine/types";

export const PLAYBACK_SPEED = {
  default: 1,
  max: 4,
  min: 0.25,
  step: 0.25,
} as const;

export const DEFAULT_FRAME_INTERVAL_MS = 50;
const MIN_FRAME_INTERVAL_MS = 10;

export function clampPlaybackSpeed(speed: number): number {
  if (!Number.isFinite(speed)) return PLAYBACK_SPEED.default;
  return Math.min(PLAYBACK_SPEED.max, Math.max(PLAYBACK_SPEED.min, speed));
}

// Milliseconds between frames at the given speed multiplier
export function frameIntervalMs(
  speed: number,
  baseFrameIntervalMs = DEFAULT_FRAME_INTERVAL_MS,
): number {
  const interval = Math.floor(baseFrameIntervalMs / clampPlaybackSpeed(speed));
  return Math.max(MIN_FRAME_INTERVAL_MS, interval);
}

export type PlaybackOptions = Readonly<{
  // Read before every frame so the pace can change mid-playback
  speed?: () => number;
  baseFrameIntervalMs?: number;
  render?: (state: PlaybackState) => void;
  signal?: AbortSignal;
  sleep?: Sleep;
}>;

/**
 * Replay at a human pace: one frame per interval, rendering after each.
 * Resolves with the last state reached, finished or not.
 */
export async function runPlayback(
  replay: ReplayData,
  rules: GameRules,
  options: PlaybackOptions = {},
): Promise<PlaybackState> {
  const signal = options.signal ?? new AbortController().signal;
  const wait = options.sleep ?? sleep;
  const speed = options.speed ?? (() => PLAYBACK_SPEED.default);

  let state = initializePlayback(replay);
  options.render?.(state);

  while (!state.isFinished) {
    const ms = frameIntervalMs(speed(), options.baseFrameIntervalMs);
    if (!(await wait(ms, signal))) {
      debugLog("replay", "playback aborted");
      break;
    }
    state = advancePlayback(state, rules);
    options.render?.(state);
  }
  return state;
}
