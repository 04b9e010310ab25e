// Board-relative coordinates. y grows downward; row 0 is the top row.
export type Position = Readonly<{ x: number; y: number }>;

export function createPosition(x: number, y: number): Position {
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    throw new Error("Position coordinates must be integers");
  }
  return { x, y };
}

export function addPosition(a: Position, b: Position): Position {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtractPosition(a: Position, b: Position): Position {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

// Pieces and rotation
export const PIECE_IDS = ["I", "O", "T", "S", "Z", "J", "L"] as const;
export type PieceId = (typeof PIECE_IDS)[number];

export function isPieceId(u: unknown): u is PieceId {
  return typeof u === "string" && (PIECE_IDS as ReadonlyArray<string>).includes(u);
}

export type Rotation = 0 | 90 | 180 | 270;

export type ActivePiece = Readonly<{
  shape: PieceId;
  pivot: Position;
  rotation: Rotation;
}>;

// Cells - a tagged union so that "filled" always carries the shape that filled it
export type Cell =
  | Readonly<{ kind: "Empty" }>
  | Readonly<{ kind: "Filled"; shape: PieceId }>;

export const EMPTY_CELL: Cell = { kind: "Empty" };

export function filledCell(shape: PieceId): Cell {
  return { kind: "Filled", shape };
}

export function isFilled(
  cell: Cell,
): cell is Extract<Cell, { kind: "Filled" }> {
  return cell.kind === "Filled";
}

// Board representation; rows are replaced, never written in place
export type Board = Readonly<{
  width: number;
  height: number;
  rows: ReadonlyArray<ReadonlyArray<Cell>>;
}>;
