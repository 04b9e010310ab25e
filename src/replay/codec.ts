import { isInput } from "../engine/commands";
import { type PieceId, isPieceId } from "../engine/core/types";
import { createFrame, frameAsNumber, isFrame } from "../types/brands";

import {
  type ReplayData,
  type ReplayEvent,
  type ReplayMetadata,
} from "./types";

export class ReplayDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReplayDecodeError";
  }
}

function isObject(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null && !Array.isArray(u);
}

function fail(message: string): never {
  throw new ReplayDecodeError(message);
}

function readInteger(obj: Record<string, unknown>, field: string): number {
  const v = obj[field];
  if (typeof v !== "number" || !Number.isInteger(v)) {
    return fail(`metadata.${field} must be an integer`);
  }
  return v;
}

function readPositiveInteger(obj: Record<string, unknown>, field: string): number {
  const v = readInteger(obj, field);
  if (v <= 0) return fail(`metadata.${field} must be a positive integer`);
  return v;
}

function readNonNegativeInteger(
  obj: Record<string, unknown>,
  field: string,
): number {
  const v = readInteger(obj, field);
  if (v < 0) return fail(`metadata.${field} must be a non-negative integer`);
  return v;
}

// Replays written before the start level was stored began at level 1
function readStartLevel(obj: Record<string, unknown>): number {
  return obj["startLevel"] === undefined ? 1 : readPositiveInteger(obj, "startLevel");
}

function readShape(obj: Record<string, unknown>, field: string): PieceId {
  const v = obj[field];
  if (!isPieceId(v)) return fail(`metadata.${field} is not a known shape`);
  return v;
}

function decodeMetadata(u: unknown): ReplayMetadata {
  if (!isObject(u)) return fail("metadata is missing");
  const version = u["version"];
  if (typeof version !== "string") return fail("metadata.version must be a string");

  return {
    boardHeight: readPositiveInteger(u, "boardHeight"),
    boardWidth: readPositiveInteger(u, "boardWidth"),
    durationMs: readNonNegativeInteger(u, "durationMs"),
    finalLevel: readPositiveInteger(u, "finalLevel"),
    finalLines: readNonNegativeInteger(u, "finalLines"),
    finalScore: readNonNegativeInteger(u, "finalScore"),
    firstShape: readShape(u, "firstShape"),
    secondShape: readShape(u, "secondShape"),
    startLevel: readStartLevel(u),
    startTimestamp: readInteger(u, "startTimestamp"),
    version,
  };
}

function decodeEvent(u: unknown, index: number): ReplayEvent {
  const at = `events[${String(index)}]`;
  if (!isObject(u)) return fail(`${at} must be an object`);

  const frame = u["frame"];
  if (!isFrame(frame)) return fail(`${at}.frame must be a non-negative integer`);

  switch (u["kind"]) {
    case "PlayerInput": {
      const input = u["input"];
      if (!isInput(input)) return fail(`${at}.input is not a known input`);
      return { frame: createFrame(frame), input, kind: "PlayerInput" };
    }
    case "PieceSpawn": {
      const shape = u["shape"];
      if (!isPieceId(shape)) return fail(`${at}.shape is not a known shape`);
      return { frame: createFrame(frame), kind: "PieceSpawn", shape };
    }
    default:
      return fail(`${at}.kind is not a known event kind`);
  }
}

/**
 * Validate an already parsed value as replay data.
 */
export function parseReplay(u: unknown): ReplayData {
  if (!isObject(u)) return fail("replay must be an object");
  const metadata = decodeMetadata(u["metadata"]);

  const rawEvents = u["events"];
  if (!Array.isArray(rawEvents)) return fail("events must be an array");

  const events: Array<ReplayEvent> = [];
  let lastFrame = 0;
  rawEvents.forEach((raw: unknown, i) => {
    const event = decodeEvent(raw, i);
    const frame = frameAsNumber(event.frame);
    if (frame < lastFrame) {
      fail(`events[${String(i)}].frame decreases from ${String(lastFrame)}`);
    }
    lastFrame = frame;
    events.push(event);
  });

  return { events, metadata };
}

export function decodeReplay(text: string): ReplayData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ReplayDecodeError(`invalid JSON: ${reason}`);
  }
  return parseReplay(parsed);
}

export function encodeReplay(replay: ReplayData): string {
  return JSON.stringify(replay, null, 2);
}
