import { placePiece } from "../core/board";
import { isGameOver } from "../core/collision";
import { createActivePiece } from "../core/pieces";
import { calculateLevel, clearLines } from "../scoring/line-clear";

import type { GameRules, GameState, PieceSupply } from "../types";

/**
 * Stamp the active piece, clear rows, then promote the preview to active and
 * draw a new preview. When the promoted piece does not fit, the game is over:
 * board and counters take the lock's result while the pieces stay as they were.
 */
export function lockActivePiece(
  state: GameState,
  supply: PieceSupply,
  rules: GameRules,
): GameState {
  const placed = placePiece(state.board, state.active);
  const cleared = clearLines(placed, state.level, rules.scoring);
  const linesCleared = state.linesCleared + cleared.linesCleared;
  const level = calculateLevel(
    linesCleared,
    rules.linesPerLevel,
    rules.startLevel,
  );
  const score = state.score + cleared.scoreGained;

  const spawned = createActivePiece(state.next, state.board.width);
  const upcoming = supply();

  if (isGameOver(spawned, cleared.board)) {
    return {
      ...state,
      board: cleared.board,
      level,
      linesCleared,
      score,
      status: "GameOver",
    };
  }

  return {
    ...state,
    active: spawned,
    board: cleared.board,
    level,
    linesCleared,
    next: upcoming,
    score,
  };
}
