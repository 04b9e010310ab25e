import { boardToRows } from "../engine/core/board";
import { hardDropPosition } from "../engine/core/collision";
import { blocksOf } from "../engine/core/pieces";

import type { GameState, Position } from "../engine/types";

export const ACTIVE_CHAR = "@";
export const GHOST_CHAR = ":";

// Raw mode turns off output post-processing, so lines end in CRLF
const NL = "\r\n";
const CLEAR_SCREEN = "\u001b[H\u001b[2J\u001b[3J";

function overlay(
  rows: Array<Array<string>>,
  cells: ReadonlyArray<Position>,
  ch: string,
  onlyEmpty: boolean,
): void {
  for (const { x, y } of cells) {
    const row = rows[y];
    if (row === undefined || row[x] === undefined) continue;
    if (onlyEmpty && row[x] !== ".") continue;
    row[x] = ch;
  }
}

function statusLine(state: GameState): string | null {
  switch (state.status) {
    case "Playing":
      return null;
    case "Paused":
      return "PAUSED";
    case "GameOver":
      return "GAME OVER";
  }
}

/**
 * The board inside a border, the falling piece and its landing shadow drawn
 * over it, followed by the score panel. The piece is not drawn once the game
 * is over.
 */
export function renderLines(state: GameState): ReadonlyArray<string> {
  const grid = boardToRows(state.board).map((r) => [...r]);
  if (state.status !== "GameOver") {
    const ghost = hardDropPosition(state.active, state.board);
    overlay(grid, blocksOf(ghost), GHOST_CHAR, true);
    overlay(grid, blocksOf(state.active), ACTIVE_CHAR, false);
  }

  const border = `+${"-".repeat(state.board.width)}+`;
  const lines = [
    border,
    ...grid.map((r) => `|${r.join("")}|`),
    border,
    `Score: ${String(state.score)}`,
    `Level: ${String(state.level)}`,
    `Lines: ${String(state.linesCleared)}`,
    `Next:  ${state.next}`,
  ];
  const status = statusLine(state);
  return status === null ? lines : [...lines, status];
}

export function renderFrame(state: GameState, footer?: string): string {
  const lines = footer === undefined ? renderLines(state) : [...renderLines(state), footer];
  return `${CLEAR_SCREEN}${lines.join(NL)}${NL}`;
}
