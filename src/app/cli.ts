import { parseArgs } from "node:util";

export const USAGE = [
  "Usage:",
  "  blockfall play [--record <name>]   play a game, optionally saving a replay",
  "  blockfall replay <name> [--speed <n>]   watch a saved replay",
  "  blockfall list                      list saved replays",
  "",
  "Options:",
  "  --config <path>   settings file (default: blockfall.config.json)",
  "  -h, --help        show this help",
].join("\n");

export type CliCommand =
  | Readonly<{ kind: "play"; record: string | null }>
  | Readonly<{ kind: "replay"; name: string; speed: number | null }>
  | Readonly<{ kind: "list" }>
  | Readonly<{ kind: "help" }>;

export type CliInvocation = Readonly<{
  command: CliCommand;
  configPath: string | null;
}>;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseSpeed(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const speed = Number(raw);
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new CliUsageError(`--speed must be a positive number, got "${raw}"`);
  }
  return speed;
}

function readArgs(argv: ReadonlyArray<string>) {
  try {
    return parseArgs({
      allowPositionals: true,
      args: [...argv],
      options: {
        config: { type: "string" },
        help: { short: "h", type: "boolean" },
        record: { type: "string" },
        speed: { type: "string" },
      },
    });
  } catch (e) {
    throw new CliUsageError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCli(argv: ReadonlyArray<string>): CliInvocation {
  const parsed = readArgs(argv);
  const { positionals, values } = parsed;
  const configPath = values.config ?? null;
  const [name, ...rest] = positionals;

  if (values.help === true || name === undefined) {
    return { command: { kind: "help" }, configPath };
  }

  switch (name) {
    case "play":
      return { command: { kind: "play", record: values.record ?? null }, configPath };
    case "replay": {
      const replayName = rest[0];
      if (replayName === undefined) {
        throw new CliUsageError("replay needs the name of a saved replay");
      }
      return {
        command: { kind: "replay", name: replayName, speed: parseSpeed(values.speed) },
        configPath,
      };
    }
    case "list":
      return { command: { kind: "list" }, configPath };
    default:
      throw new CliUsageError(`unknown command "${name}"`);
  }
}
