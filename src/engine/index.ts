import { dropInterval } from "./scoring/line-clear";
import { update } from "./step/update";

import type { Input } from "./commands";
import type { GameRules, GameState, PieceId, PieceSupply } from "./types";

export { update } from "./step/update";
export { createInitialState, defaultRules } from "./types";
export type { GameRules, GameState, GameStatus } from "./types";
export type { Input } from "./commands";

export type Outcome = Readonly<{
  state: GameState;
  // null once the game is over; the tick producer keeps its last interval
  nextIntervalMs: number | null;
  // Shape drawn from the supply by a lock during this step, if any
  spawned: PieceId | null;
  shouldContinue: boolean;
}>;

/**
 * One step of the consumer loop: apply the input, then derive the drop
 * interval for the resulting level.
 */
export function handleInput(
  state: GameState,
  input: Input,
  supply: PieceSupply,
  rules: GameRules,
): Outcome {
  let spawned: PieceId | null = null;
  const tracked: PieceSupply = () => {
    const piece = supply();
    spawned = piece;
    return piece;
  };

  const next = update(state, input, tracked, rules);
  const over = next.status === "GameOver";
  return {
    nextIntervalMs: over ? null : dropInterval(next.level, rules.speed),
    shouldContinue: !over,
    spawned,
    state: next,
  };
}
