import { createEmptyBoard } from "./core/board";
import { createActivePiece } from "./core/pieces";
import { type ActivePiece, type Board, type PieceId } from "./core/types";
import { type ScoreTable, type SpeedRules } from "./scoring/line-clear";

export * from "./core/types";
export { type PieceSupply } from "./core/rng/interface";

export type GameStatus = "Playing" | "Paused" | "GameOver";

export type GameState = Readonly<{
  board: Board;
  active: ActivePiece;
  next: PieceId;
  score: number;
  level: number;
  linesCleared: number;
  status: GameStatus;
}>;

// Tunables consumed by the state machine and the game loop
export type GameRules = Readonly<{
  boardWidth: number;
  boardHeight: number;
  scoring: ScoreTable;
  linesPerLevel: number;
  startLevel: number;
  speed: SpeedRules;
}>;

export const defaultRules: GameRules = {
  boardHeight: 20,
  boardWidth: 10,
  linesPerLevel: 10,
  scoring: { double: 300, single: 100, tetris: 800, triple: 500 },
  speed: {
    baseDropIntervalMs: 1000,
    decreasePerLevelMs: 100,
    minDropIntervalMs: 50,
  },
  startLevel: 1,
};

export function createInitialState(
  first: PieceId,
  second: PieceId,
  width: number,
  height: number,
  startLevel = 1,
): GameState {
  return {
    active: createActivePiece(first, width),
    board: createEmptyBoard(width, height),
    level: startLevel,
    linesCleared: 0,
    next: second,
    score: 0,
    status: "Playing",
  };
}
