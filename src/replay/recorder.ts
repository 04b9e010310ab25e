import { type Input } from "../engine/commands";
import { type PieceId } from "../engine/core/types";
import { type GameState } from "../engine/types";
import { type Frame, createFrame, nextFrame } from "../types/brands";

import {
  REPLAY_FORMAT_VERSION,
  type ReplayData,
  type ReplayEvent,
} from "./types";

export type RecorderStart = Readonly<{
  startTimestamp: number;
  boardWidth: number;
  boardHeight: number;
  firstShape: PieceId;
  secondShape: PieceId;
  startLevel: number;
}>;

/**
 * Accumulates replay events for one session. Every method returns a new
 * recorder; an instance never changes once created.
 */
export class ReplayRecorder {
  private constructor(
    private readonly start: RecorderStart,
    readonly events: ReadonlyArray<ReplayEvent>,
    readonly currentFrame: Frame,
  ) {}

  static create(start: RecorderStart): ReplayRecorder {
    return new ReplayRecorder(start, [], createFrame(0));
  }

  recordInput(input: Input): ReplayRecorder {
    return this.append({ frame: this.currentFrame, input, kind: "PlayerInput" });
  }

  recordPieceSpawn(shape: PieceId): ReplayRecorder {
    return this.append({ frame: this.currentFrame, kind: "PieceSpawn", shape });
  }

  advanceFrame(): ReplayRecorder {
    return new ReplayRecorder(this.start, this.events, nextFrame(this.currentFrame));
  }

  /**
   * Record one consumed command as a frame. A shape drawn by a lock is logged
   * ahead of the input so playback has it queued when the input locks.
   */
  recordStep(input: Input, spawned: PieceId | null): ReplayRecorder {
    const withSpawn =
      spawned === null ? this : this.recordPieceSpawn(spawned);
    return withSpawn.recordInput(input).advanceFrame();
  }

  build(finalState: GameState, endTimestamp: number): ReplayData {
    return {
      events: this.events,
      metadata: {
        boardHeight: this.start.boardHeight,
        boardWidth: this.start.boardWidth,
        durationMs: endTimestamp - this.start.startTimestamp,
        finalLevel: finalState.level,
        finalLines: finalState.linesCleared,
        finalScore: finalState.score,
        firstShape: this.start.firstShape,
        secondShape: this.start.secondShape,
        startLevel: this.start.startLevel,
        startTimestamp: this.start.startTimestamp,
        version: REPLAY_FORMAT_VERSION,
      },
    };
  }

  private append(event: ReplayEvent): ReplayRecorder {
    return new ReplayRecorder(
      this.start,
      [...this.events, event],
      this.currentFrame,
    );
  }
}
