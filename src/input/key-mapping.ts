import { type Input } from "../engine/commands";

export const ESCAPE_BYTE = 27;
export const BRACKET_BYTE = "[".charCodeAt(0);

// Result of decoding one key press
export type ParsedKey =
  | Readonly<{ kind: "Input"; input: Input }>
  | Readonly<{ kind: "Quit" }>
  | Readonly<{ kind: "Unknown"; bytes: ReadonlyArray<number> }>;

const REGULAR_KEYS: Readonly<Record<string, Input>> = {
  " ": "HardDrop",
  H: "MoveLeft",
  J: "MoveDown",
  K: "RotateClockwise",
  L: "MoveRight",
  P: "Pause",
  Z: "RotateCounterClockwise",
  h: "MoveLeft",
  j: "MoveDown",
  k: "RotateClockwise",
  l: "MoveRight",
  p: "Pause",
  z: "RotateCounterClockwise",
};

// Final byte of ESC [ x arrow sequences
const ARROW_KEYS: Readonly<Record<string, Input>> = {
  A: "RotateClockwise",
  B: "MoveDown",
  C: "MoveRight",
  D: "MoveLeft",
};

export function isQuitKey(byte: number): boolean {
  return byte === "q".charCodeAt(0) || byte === "Q".charCodeAt(0);
}

export function keyToInput(byte: number): Input | null {
  return REGULAR_KEYS[String.fromCharCode(byte)] ?? null;
}

export function arrowToInput(byte: number): Input | null {
  return ARROW_KEYS[String.fromCharCode(byte)] ?? null;
}

export function parseRegularKey(byte: number): ParsedKey {
  if (isQuitKey(byte)) return { kind: "Quit" };
  const input = keyToInput(byte);
  return input === null ? { bytes: [byte], kind: "Unknown" } : { input, kind: "Input" };
}
