// Player and timer inputs accepted by the state machine
export const INPUTS = [
  "MoveLeft",
  "MoveRight",
  "MoveDown",
  "RotateClockwise",
  "RotateCounterClockwise",
  "HardDrop",
  "Pause",
  "Quit",
  "Tick",
] as const;

export type Input = (typeof INPUTS)[number];

export function isInput(u: unknown): u is Input {
  return typeof u === "string" && (INPUTS as ReadonlyArray<string>).includes(u);
}
