import { type Input } from "../engine/commands";
import { type PieceId } from "../engine/core/types";
import { type Frame } from "../types/brands";

export const REPLAY_FORMAT_VERSION = "1.0";

export type ReplayEvent =
  | Readonly<{ kind: "PlayerInput"; input: Input; frame: Frame }>
  | Readonly<{ kind: "PieceSpawn"; shape: PieceId; frame: Frame }>;

export type ReplayMetadata = Readonly<{
  version: string;
  startTimestamp: number;
  boardWidth: number;
  boardHeight: number;
  firstShape: PieceId;
  secondShape: PieceId;
  startLevel: number;
  finalScore: number;
  finalLevel: number;
  finalLines: number;
  durationMs: number;
}>;

// Write-once record of a session; frames never decrease along events
export type ReplayData = Readonly<{
  metadata: ReplayMetadata;
  events: ReadonlyArray<ReplayEvent>;
}>;
