import { clearRows, getCompletedRows } from "../core/board";
import { type Board } from "../core/types";

// Base points per number of rows cleared by a single lock
export type ScoreTable = Readonly<{
  single: number;
  double: number;
  triple: number;
  tetris: number;
}>;

export type SpeedRules = Readonly<{
  baseDropIntervalMs: number;
  minDropIntervalMs: number;
  decreasePerLevelMs: number;
}>;

export type LineClearResult = Readonly<{
  board: Board;
  linesCleared: number;
  scoreGained: number;
}>;

export function calculateScore(
  lines: number,
  level: number,
  table: ScoreTable,
): number {
  switch (lines) {
    case 1:
      return table.single * level;
    case 2:
      return table.double * level;
    case 3:
      return table.triple * level;
    case 4:
      return table.tetris * level;
    default:
      return 0;
  }
}

/**
 * Remove every complete row and score them at the given level.
 * With nothing to clear the same board instance comes back.
 */
export function clearLines(
  board: Board,
  level: number,
  table: ScoreTable,
): LineClearResult {
  const completed = getCompletedRows(board);
  if (completed.length === 0) {
    return { board, linesCleared: 0, scoreGained: 0 };
  }
  return {
    board: clearRows(board, completed),
    linesCleared: completed.length,
    scoreGained: calculateScore(completed.length, level, table),
  };
}

export function calculateLevel(
  totalLines: number,
  linesPerLevel: number,
  startLevel = 1,
): number {
  return startLevel + Math.floor(totalLines / linesPerLevel);
}

// Gravity interval for a level, floored at the configured minimum
export function dropInterval(level: number, speed: SpeedRules): number {
  const reduced =
    speed.baseDropIntervalMs - (level - 1) * speed.decreasePerLevelMs;
  return Math.max(speed.minDropIntervalMs, reduced);
}
