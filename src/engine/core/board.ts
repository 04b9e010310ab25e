import { blocksOf } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type Cell,
  type Position,
  EMPTY_CELL,
  filledCell,
  isFilled,
} from "./types";

function emptyRow(width: number): ReadonlyArray<Cell> {
  return Array.from({ length: width }, () => EMPTY_CELL);
}

export function createEmptyBoard(width: number, height: number): Board {
  if (!Number.isInteger(width) || width <= 0) {
    throw new Error("Board width must be a positive integer");
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new Error("Board height must be a positive integer");
  }
  return {
    height,
    rows: Array.from({ length: height }, () => emptyRow(width)),
    width,
  };
}

export function isInBounds(board: Board, pos: Position): boolean {
  return pos.x >= 0 && pos.x < board.width && pos.y >= 0 && pos.y < board.height;
}

// Returns undefined for positions outside the board
export function getCell(board: Board, pos: Position): Cell | undefined {
  if (!isInBounds(board, pos)) return undefined;
  return board.rows[pos.y]?.[pos.x];
}

export function isEmptyAt(board: Board, pos: Position): boolean {
  return getCell(board, pos)?.kind === "Empty";
}

// Write a single cell; positions outside the board leave it unchanged
export function placeCell(board: Board, pos: Position, cell: Cell): Board {
  const row = board.rows[pos.y];
  if (!isInBounds(board, pos) || row === undefined) return board;

  const newRow = [...row];
  newRow[pos.x] = cell;
  const newRows = [...board.rows];
  newRows[pos.y] = newRow;
  return { ...board, rows: newRows };
}

// Stamp all blocks of a piece onto the board
export function placePiece(board: Board, piece: ActivePiece): Board {
  const cell = filledCell(piece.shape);
  return blocksOf(piece).reduce((b, pos) => placeCell(b, pos, cell), board);
}

// Check for completed rows, top to bottom
export function getCompletedRows(board: Board): ReadonlyArray<number> {
  const completed: Array<number> = [];
  board.rows.forEach((row, y) => {
    if (row.every(isFilled)) completed.push(y);
  });
  return completed;
}

/**
 * Remove the given rows. Everything above a removed row moves down and the
 * same number of empty rows is added at the top. Index order is irrelevant.
 */
export function clearRows(board: Board, toClear: ReadonlyArray<number>): Board {
  const clearedSet = new Set(
    toClear.filter((y) => Number.isInteger(y) && y >= 0 && y < board.height),
  );
  if (clearedSet.size === 0) return board;

  const kept = board.rows.filter((_, y) => !clearedSet.has(y));
  const fresh = Array.from({ length: clearedSet.size }, () =>
    emptyRow(board.width),
  );
  return { ...board, rows: [...fresh, ...kept] };
}

// Shape letters for filled cells, "." for empty ones; one string per row
export function boardToRows(board: Board): ReadonlyArray<string> {
  return board.rows.map((row) =>
    row.map((cell) => (isFilled(cell) ? cell.shape : ".")).join(""),
  );
}
