// Collision checks and rotation with wall kicks
//
// Kick offsets are a simplified table: one list per shape family, shared by all
// rotation transitions, tried strictly in order. The first offset that puts the
// rotated piece in a valid position wins.

import { isEmptyAt } from "./board";
import { blocksOf, movePiece, rotatePiece } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type PieceId,
  type Position,
} from "./types";

type KickTable = ReadonlyArray<readonly [number, number]>;

export const KICKS_I: KickTable = [
  [0, 0],
  [-2, 0],
  [2, 0],
  [-2, 1],
  [2, -1],
];

export const KICKS_O: KickTable = [[0, 0]];

export const KICKS_DEFAULT: KickTable = [
  [0, 0],
  [-1, 0],
  [1, 0],
  [0, -1],
  [-1, -1],
  [1, -1],
];

export function getKickTable(shape: PieceId): KickTable {
  switch (shape) {
    case "I":
      return KICKS_I;
    case "O":
      return KICKS_O;
    default:
      return KICKS_DEFAULT;
  }
}

export type CollisionKind = "none" | "wall" | "floor" | "ceiling" | "block";

function isWithinHorizontalBounds(pos: Position, board: Board): boolean {
  return pos.x >= 0 && pos.x < board.width;
}

// Rows above the board are not a spawn buffer; they count as out of bounds
function isWithinVerticalBounds(pos: Position, board: Board): boolean {
  return pos.y >= 0 && pos.y < board.height;
}

export function isValidPosition(piece: ActivePiece, board: Board): boolean {
  return blocksOf(piece).every(
    (pos) =>
      isWithinHorizontalBounds(pos, board) &&
      isWithinVerticalBounds(pos, board) &&
      isEmptyAt(board, pos),
  );
}

/**
 * Classify why a piece is (in)valid. Walls are reported before the floor,
 * the floor before the ceiling, and board bounds before occupied cells.
 */
export function detectCollision(
  piece: ActivePiece,
  board: Board,
): CollisionKind {
  const blocks = blocksOf(piece);
  if (blocks.some((p) => !isWithinHorizontalBounds(p, board))) return "wall";
  if (blocks.some((p) => p.y >= board.height)) return "floor";
  if (blocks.some((p) => p.y < 0)) return "ceiling";
  if (blocks.some((p) => !isEmptyAt(board, p))) return "block";
  return "none";
}

// Valid where it is, but one row lower would collide
export function hasLanded(piece: ActivePiece, board: Board): boolean {
  return (
    isValidPosition(piece, board) &&
    !isValidPosition(movePiece(piece, 0, 1), board)
  );
}

// Drop piece to the lowest position reachable straight down
export function hardDropPosition(
  piece: ActivePiece,
  board: Board,
): ActivePiece {
  let current = piece;
  for (let i = 0; i < board.height; i++) {
    const next = movePiece(current, 0, 1);
    if (!isValidPosition(next, board)) break;
    current = next;
  }
  return current;
}

/**
 * Result of attempting a rotation with kick information
 */
export type RotateResult = {
  piece: ActivePiece | null;
  kickIndex: number; // -1 if rejected
  kickOffset: readonly [number, number];
};

export function tryRotateWithKickInfo(
  piece: ActivePiece,
  board: Board,
  clockwise: boolean,
): RotateResult {
  const rotated = rotatePiece(piece, clockwise ? "CW" : "CCW");
  const kicks = getKickTable(piece.shape);

  for (let i = 0; i < kicks.length; i++) {
    const kickOffset = kicks[i];
    if (!kickOffset) continue;

    const [dx, dy] = kickOffset;
    const kicked = movePiece(rotated, dx, dy);
    if (isValidPosition(kicked, board)) {
      return { kickIndex: i, kickOffset, piece: kicked };
    }
  }

  return { kickIndex: -1, kickOffset: [0, 0], piece: null };
}

// Perform a rotation with wall kicks; null when every kick is blocked
export function tryRotate(
  piece: ActivePiece,
  board: Board,
  clockwise: boolean,
): ActivePiece | null {
  return tryRotateWithKickInfo(piece, board, clockwise).piece;
}

// A freshly spawned piece that does not fit ends the game
export function isGameOver(piece: ActivePiece, board: Board): boolean {
  return !isValidPosition(piece, board);
}
