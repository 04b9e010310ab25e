// Settings: defaults, JSON file loading and per-field coercion.
// Every field is validated on its own; a bad value falls back to its default
// without affecting its neighbours.

import { readFileSync } from "node:fs";

import { debugLog } from "../utils/debug";

import type { GameRules } from "../engine/types";
import type { ScoreTable, SpeedRules } from "../engine/scoring/line-clear";
import type { InputTimings } from "../runtime/input-stream";

export const CONFIG_FILE_NAME = "blockfall.config.json";

export const PIECE_GENERATORS = ["sevenBag", "uniform"] as const;
export type PieceGeneratorKind = (typeof PIECE_GENERATORS)[number];

export type Settings = Readonly<{
  board: Readonly<{ width: number; height: number }>;
  score: ScoreTable;
  level: Readonly<{ linesPerLevel: number; startLevel: number }>;
  speed: SpeedRules;
  terminal: InputTimings;
  queueCapacity: number;
  replay: Readonly<{
    directory: string;
    defaultSpeed: number;
    baseFrameIntervalMs: number;
  }>;
  pieces: Readonly<{ generator: PieceGeneratorKind; seed: string | null }>;
}>;

export function defaultSettings(): Settings {
  return {
    board: { height: 20, width: 10 },
    level: { linesPerLevel: 10, startLevel: 1 },
    pieces: { generator: "sevenBag", seed: null },
    queueCapacity: 100,
    replay: { baseFrameIntervalMs: 50, defaultSpeed: 1, directory: "replays" },
    score: { double: 300, single: 100, tetris: 800, triple: 500 },
    speed: {
      baseDropIntervalMs: 1000,
      decreasePerLevelMs: 100,
      minDropIntervalMs: 50,
    },
    terminal: {
      escapeSequenceSecondWaitMs: 5,
      escapeSequenceWaitMs: 20,
      pollIntervalMs: 20,
    },
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isPositiveInteger(x: unknown): x is number {
  return isNumber(x) && Number.isInteger(x) && x > 0;
}

function isNonNegative(x: unknown): x is number {
  return isNumber(x) && x >= 0;
}

function isPositive(x: unknown): x is number {
  return isNumber(x) && x > 0;
}

function isNonEmptyString(x: unknown): x is string {
  return typeof x === "string" && x.trim().length > 0;
}

function isPieceGenerator(x: unknown): x is PieceGeneratorKind {
  return (
    typeof x === "string" &&
    (PIECE_GENERATORS as ReadonlyArray<string>).includes(x)
  );
}

function section(u: unknown, key: string): Record<string, unknown> {
  if (!isRecord(u)) return {};
  const v = u[key];
  return isRecord(v) ? v : {};
}

function pick<T>(
  value: unknown,
  guard: (x: unknown) => x is T,
  fallback: T,
): T {
  return guard(value) ? value : fallback;
}

export function coerceSettings(u: unknown): Settings {
  const d = defaultSettings();
  const board = section(u, "board");
  const score = section(u, "score");
  const level = section(u, "level");
  const speed = section(u, "speed");
  const terminal = section(u, "terminal");
  const replay = section(u, "replay");
  const pieces = section(u, "pieces");
  const root = isRecord(u) ? u : {};
  const seed = pieces["seed"];

  return {
    board: {
      height: pick(board["height"], isPositiveInteger, d.board.height),
      width: pick(board["width"], isPositiveInteger, d.board.width),
    },
    level: {
      linesPerLevel: pick(
        level["linesPerLevel"],
        isPositiveInteger,
        d.level.linesPerLevel,
      ),
      startLevel: pick(level["startLevel"], isPositiveInteger, d.level.startLevel),
    },
    pieces: {
      generator: pick(pieces["generator"], isPieceGenerator, d.pieces.generator),
      seed: isNonEmptyString(seed) ? seed : d.pieces.seed,
    },
    queueCapacity: pick(root["queueCapacity"], isPositiveInteger, d.queueCapacity),
    replay: {
      baseFrameIntervalMs: pick(
        replay["baseFrameIntervalMs"],
        isPositive,
        d.replay.baseFrameIntervalMs,
      ),
      defaultSpeed: pick(replay["defaultSpeed"], isPositive, d.replay.defaultSpeed),
      directory: pick(replay["directory"], isNonEmptyString, d.replay.directory),
    },
    score: {
      double: pick(score["double"], isNonNegative, d.score.double),
      single: pick(score["single"], isNonNegative, d.score.single),
      tetris: pick(score["tetris"], isNonNegative, d.score.tetris),
      triple: pick(score["triple"], isNonNegative, d.score.triple),
    },
    speed: {
      baseDropIntervalMs: pick(
        speed["baseDropIntervalMs"],
        isPositive,
        d.speed.baseDropIntervalMs,
      ),
      decreasePerLevelMs: pick(
        speed["decreasePerLevelMs"],
        isNonNegative,
        d.speed.decreasePerLevelMs,
      ),
      minDropIntervalMs: pick(
        speed["minDropIntervalMs"],
        isPositive,
        d.speed.minDropIntervalMs,
      ),
    },
    terminal: {
      escapeSequenceSecondWaitMs: pick(
        terminal["escapeSequenceSecondWaitMs"],
        isNonNegative,
        d.terminal.escapeSequenceSecondWaitMs,
      ),
      escapeSequenceWaitMs: pick(
        terminal["escapeSequenceWaitMs"],
        isNonNegative,
        d.terminal.escapeSequenceWaitMs,
      ),
      pollIntervalMs: pick(
        terminal["pollIntervalMs"],
        isPositive,
        d.terminal.pollIntervalMs,
      ),
    },
  };
}

// Missing or unreadable files and malformed JSON all yield the defaults
export function loadSettings(path: string): Settings {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (e) {
    debugLog("settings", `no settings read from ${path}`, e);
    return defaultSettings();
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return coerceSettings(parsed);
  } catch (e) {
    debugLog("settings", `malformed settings in ${path}`, e);
    return defaultSettings();
  }
}

export function toGameRules(settings: Settings): GameRules {
  return {
    boardHeight: settings.board.height,
    boardWidth: settings.board.width,
    linesPerLevel: settings.level.linesPerLevel,
    scoring: settings.score,
    speed: settings.speed,
    startLevel: settings.level.startLevel,
  };
}
