import { mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { debugLog } from "../utils/debug";

import { decodeReplay, encodeReplay } from "./codec";
import {
  type ReplayRepository,
  ReplayNotFoundError,
  assertValidReplayName,
} from "./repository";
import { type ReplayData } from "./types";

const EXTENSION = ".json";

// fs errors can come from another realm, so no instanceof check
function isMissingFile(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

/**
 * Stores each replay as `<name>.json` inside one directory, created on the
 * first save.
 */
export class FileReplayRepository implements ReplayRepository {
  constructor(private readonly dir: string) {}

  async save(name: string, replay: ReplayData): Promise<void> {
    const path = this.pathFor(name);
    await mkdir(this.dir, { recursive: true });
    await writeFile(path, encodeReplay(replay), "utf8");
    debugLog("replay", `saved ${name}`, { events: replay.events.length });
  }

  async load(name: string): Promise<ReplayData> {
    const path = this.pathFor(name);
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (e) {
      if (isMissingFile(e)) throw new ReplayNotFoundError(name);
      throw e;
    }
    return decodeReplay(text);
  }

  async list(): Promise<ReadonlyArray<string>> {
    let entries: Array<string>;
    try {
      entries = await readdir(this.dir);
    } catch (e) {
      if (isMissingFile(e)) return [];
      throw e;
    }
    return entries
      .filter((f) => f.endsWith(EXTENSION))
      .map((f) => f.slice(0, -EXTENSION.length))
      .sort();
  }

  async exists(name: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(name));
      return info.isFile();
    } catch (e) {
      if (isMissingFile(e)) return false;
      throw e;
    }
  }

  async delete(name: string): Promise<void> {
    await rm(this.pathFor(name), { force: true });
  }

  private pathFor(name: string): string {
    assertValidReplayName(name);
    return join(this.dir, `${name}${EXTENSION}`);
  }
}
