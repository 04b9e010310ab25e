import {
  type ActivePiece,
  type PieceId,
  type Position,
  type Rotation,
  addPosition,
} from "./types";

/**
 * Block offsets of each shape at rotation 0, relative to the pivot.
 * Negative y is above the pivot.
 */
export const PIECES: Readonly<Record<PieceId, ReadonlyArray<Position>>> = {
  I: [
    { x: -1, y: 0 },
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 2, y: 0 },
  ],
  J: [
    { x: -1, y: -1 },
    { x: -1, y: 0 },
    { x: 0, y: 0 },
    { x: 1, y: 0 },
  ],
  L: [
    { x: -1, y: 0 },
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 1, y: -1 },
  ],
  O: [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 1 },
  ],
  S: [
    { x: -1, y: 0 },
    { x: 0, y: 0 },
    { x: 0, y: -1 },
    { x: 1, y: -1 },
  ],
  T: [
    { x: -1, y: 0 },
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 0, y: -1 },
  ],
  Z: [
    { x: -1, y: -1 },
    { x: 0, y: -1 },
    { x: 0, y: 0 },
    { x: 1, y: 0 },
  ],
};

// Helper function to get the next rotation state
export function getNextRotation(
  current: Rotation,
  direction: "CW" | "CCW",
): Rotation {
  if (direction === "CW") {
    switch (current) {
      case 0:
        return 90;
      case 90:
        return 180;
      case 180:
        return 270;
      case 270:
        return 0;
    }
  }
  switch (current) {
    case 0:
      return 270;
    case 270:
      return 180;
    case 180:
      return 90;
    case 90:
      return 0;
  }
}

function rotateOffset(offset: Position, rotation: Rotation): Position {
  switch (rotation) {
    case 0:
      return offset;
    case 90:
      return { x: -offset.y, y: offset.x };
    case 180:
      return { x: -offset.x, y: -offset.y };
    case 270:
      return { x: offset.y, y: -offset.x };
  }
}

/**
 * Absolute board positions of the piece's four blocks.
 * Recomputed on every call.
 */
export function blocksOf(piece: ActivePiece): ReadonlyArray<Position> {
  return PIECES[piece.shape].map((offset) =>
    addPosition(rotateOffset(offset, piece.rotation), piece.pivot),
  );
}

export function movePiece(
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece {
  return { ...piece, pivot: { x: piece.pivot.x + dx, y: piece.pivot.y + dy } };
}

export function rotatePiece(
  piece: ActivePiece,
  direction: "CW" | "CCW",
): ActivePiece {
  return { ...piece, rotation: getNextRotation(piece.rotation, direction) };
}

/**
 * Create a new active piece at the spawn position: horizontally centered,
 * one row below the top so that blocks with negative offsets stay on the board.
 */
export function createActivePiece(
  shape: PieceId,
  boardWidth: number,
): ActivePiece {
  return {
    pivot: { x: Math.floor(boardWidth / 2), y: 1 },
    rotation: 0,
    shape,
  };
}
