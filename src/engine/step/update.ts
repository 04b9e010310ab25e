import { hardDropPosition, isValidPosition, tryRotate } from "../core/collision";
import { movePiece } from "../core/pieces";

import { lockActivePiece } from "./lock";

import type { Input } from "../commands";
import type { GameRules, GameState, PieceSupply } from "../types";

// Lateral moves are silently rejected when the target is blocked
function handleMove(state: GameState, dx: number): GameState {
  const moved = movePiece(state.active, dx, 0);
  if (!isValidPosition(moved, state.board)) return state;
  return { ...state, active: moved };
}

// Descend one row, or lock in place when the row below is blocked
function handleMoveDown(
  state: GameState,
  supply: PieceSupply,
  rules: GameRules,
): GameState {
  const moved = movePiece(state.active, 0, 1);
  if (isValidPosition(moved, state.board)) {
    return { ...state, active: moved };
  }
  return lockActivePiece(state, supply, rules);
}

function handleRotation(state: GameState, clockwise: boolean): GameState {
  const rotated = tryRotate(state.active, state.board, clockwise);
  if (rotated === null) return state;
  return { ...state, active: rotated };
}

// Two points per row dropped, then lock
function handleHardDrop(
  state: GameState,
  supply: PieceSupply,
  rules: GameRules,
): GameState {
  const dropped = hardDropPosition(state.active, state.board);
  const distance = dropped.pivot.y - state.active.pivot.y;
  return lockActivePiece(
    { ...state, active: dropped, score: state.score + distance * 2 },
    supply,
    rules,
  );
}

function handlePlaying(
  state: GameState,
  input: Input,
  supply: PieceSupply,
  rules: GameRules,
): GameState {
  switch (input) {
    case "MoveLeft":
      return handleMove(state, -1);
    case "MoveRight":
      return handleMove(state, 1);
    case "MoveDown":
    case "Tick":
      return handleMoveDown(state, supply, rules);
    case "RotateClockwise":
      return handleRotation(state, true);
    case "RotateCounterClockwise":
      return handleRotation(state, false);
    case "HardDrop":
      return handleHardDrop(state, supply, rules);
    case "Pause":
      return { ...state, status: "Paused" };
    case "Quit":
      return state;
  }
}

/**
 * Apply one input to the game state. Pure apart from the supply, which is
 * called exactly once per lock and never otherwise.
 */
export function update(
  state: GameState,
  input: Input,
  supply: PieceSupply,
  rules: GameRules,
): GameState {
  switch (state.status) {
    case "Playing":
      return handlePlaying(state, input, supply, rules);
    case "Paused":
      return input === "Pause" ? { ...state, status: "Playing" } : state;
    case "GameOver":
      return state;
  }
}
