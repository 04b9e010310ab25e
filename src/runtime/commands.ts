import { type Input } from "../engine/commands";

// Everything the producers hand to the single consumer
export type GameCommand =
  | Readonly<{ kind: "UserAction"; input: Input }>
  | Readonly<{ kind: "TimeTick" }>
  | Readonly<{ kind: "Quit" }>;

export const timeTick: GameCommand = { kind: "TimeTick" };
export const quit: GameCommand = { kind: "Quit" };

export function userAction(input: Input): GameCommand {
  return { input, kind: "UserAction" };
}

// The state-machine input a command stands for; Quit has none
export function commandToInput(command: GameCommand): Input | null {
  switch (command.kind) {
    case "UserAction":
      return command.input;
    case "TimeTick":
      return "Tick";
    case "Quit":
      return null;
  }
}
