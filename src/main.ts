#!/usr/bin/env node
import { resolve } from "node:path";

import { CONFIG_FILE_NAME, loadSettings, toGameRules, type Settings } from "./app/settings";
import { CliUsageError, USAGE, parseCli, type CliCommand } from "./app/cli";
import { toPieceSupply, type PieceRandomGenerator } from "./engine/core/rng/interface";
import { createSevenBagRng, createUniformRng } from "./engine/core/rng/seeded";
import { createInitialState } from "./engine/types";
import { StdinKeySource } from "./input/key-source";
import { playbackProgress } from "./replay/player";
import { FileReplayRepository } from "./replay/file-repository";
import { type ReplayRepository } from "./replay/repository";
import {
  PLAYBACK_SPEED,
  clampPlaybackSpeed,
  runPlayback,
} from "./runtime/playback";
import { runSession } from "./runtime/session";
import { renderFrame } from "./ui/text-frame";
import { debugLog } from "./utils/debug";

function createRng(settings: Settings): PieceRandomGenerator {
  const seed = settings.pieces.seed ?? String(Date.now());
  debugLog("session", `piece generator ${settings.pieces.generator}, seed ${seed}`);
  return settings.pieces.generator === "uniform"
    ? createUniformRng(seed)
    : createSevenBagRng(seed);
}

async function play(
  settings: Settings,
  repository: ReplayRepository,
  recordName: string | null,
): Promise<void> {
  const rules = toGameRules(settings);
  const rng = createRng(settings);
  const first = rng.getNextPiece();
  const second = first.newRng.getNextPiece();

  const source = new StdinKeySource();
  const { state, replay: recorded } = await runSession({
    initialState: createInitialState(
      first.piece,
      second.piece,
      rules.boardWidth,
      rules.boardHeight,
      rules.startLevel,
    ),
    queueCapacity: settings.queueCapacity,
    record: recordName !== null,
    render: (s) => process.stdout.write(renderFrame(s)),
    rules,
    source,
    supply: toPieceSupply(second.newRng),
    timings: settings.terminal,
  }).finally(() => source.close());

  process.stdout.write(
    `Final score ${String(state.score)} (lines ${String(state.linesCleared)}, level ${String(state.level)})\n`,
  );
  if (recordName !== null && recorded !== null) {
    await repository.save(recordName, recorded);
    process.stdout.write(`Saved replay "${recordName}"\n`);
  }
}

async function replay(
  settings: Settings,
  repository: ReplayRepository,
  name: string,
  speedArg: number | null,
): Promise<void> {
  const data = await repository.load(name);
  const rules = toGameRules(settings);
  let speed = clampPlaybackSpeed(speedArg ?? settings.replay.defaultSpeed);

  // q stops playback, + and - change the pace
  const controller = new AbortController();
  const source = new StdinKeySource();
  const handleKeys = (): void => {
    for (let byte = source.read(); byte !== null; byte = source.read()) {
      const key = String.fromCharCode(byte);
      if (key === "q" || key === "Q") controller.abort();
      if (key === "+") speed = clampPlaybackSpeed(speed + PLAYBACK_SPEED.step);
      if (key === "-") speed = clampPlaybackSpeed(speed - PLAYBACK_SPEED.step);
    }
  };

  try {
    await runPlayback(data, rules, {
      baseFrameIntervalMs: settings.replay.baseFrameIntervalMs,
      render: (playback) => {
        handleKeys();
        const progress = Math.floor(playbackProgress(playback) * 100);
        const footer = `[REPLAY] Speed: ${String(speed)}x | Progress: ${String(progress)}% | Q: Quit, +/-: Speed`;
        process.stdout.write(renderFrame(playback.gameState, footer));
      },
      signal: controller.signal,
      speed: () => speed,
    });
  } finally {
    source.close();
  }
  process.stdout.write("Replay finished.\n");
}

async function list(repository: ReplayRepository): Promise<void> {
  const names = await repository.list();
  if (names.length === 0) {
    process.stdout.write("No replays saved.\n");
    return;
  }
  for (const name of names) process.stdout.write(`${name}\n`);
}

async function execute(
  command: CliCommand,
  settings: Settings,
  repository: ReplayRepository,
): Promise<void> {
  switch (command.kind) {
    case "play":
      return play(settings, repository, command.record);
    case "replay":
      return replay(settings, repository, command.name, command.speed);
    case "list":
      return list(repository);
    case "help":
      process.stdout.write(`${USAGE}\n`);
      return;
  }
}

async function main(argv: ReadonlyArray<string>): Promise<number> {
  const { command, configPath } = parseCli(argv);
  const settings = loadSettings(resolve(configPath ?? CONFIG_FILE_NAME));
  const repository = new FileReplayRepository(resolve(settings.replay.directory));
  await execute(command, settings, repository);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    const message = e instanceof Error ? e.message : String(e);
    process.stderr.write(`blockfall: ${message}\n`);
    if (e instanceof CliUsageError) process.stderr.write(`${USAGE}\n`);
    process.exitCode = 1;
  },
);
