import { type ReplayData } from "./types";

export type ReplayRepository = {
  save(name: string, replay: ReplayData): Promise<void>;
  // Rejects with ReplayNotFoundError when no replay has that name
  load(name: string): Promise<ReplayData>;
  // Stored names in ascending order
  list(): Promise<ReadonlyArray<string>>;
  exists(name: string): Promise<boolean>;
  delete(name: string): Promise<void>;
};

export class ReplayNotFoundError extends Error {
  constructor(readonly replayName: string) {
    super(`Replay not found: ${replayName}`);
    this.name = "ReplayNotFoundError";
  }
}

// Names become file names; separators and parent references are refused
export function assertValidReplayName(name: string): void {
  if (name === "" || /[/\\]/.test(name) || name.includes("..")) {
    throw new Error(`Invalid replay name: ${JSON.stringify(name)}`);
  }
}

export class InMemoryReplayRepository implements ReplayRepository {
  private readonly replays = new Map<string, ReplayData>();

  async save(name: string, replay: ReplayData): Promise<void> {
    assertValidReplayName(name);
    this.replays.set(name, replay);
  }

  async load(name: string): Promise<ReplayData> {
    assertValidReplayName(name);
    const replay = this.replays.get(name);
    if (replay === undefined) throw new ReplayNotFoundError(name);
    return replay;
  }

  async list(): Promise<ReadonlyArray<string>> {
    return [...this.replays.keys()].sort();
  }

  async exists(name: string): Promise<boolean> {
    assertValidReplayName(name);
    return this.replays.has(name);
  }

  async delete(name: string): Promise<void> {
    assertValidReplayName(name);
    this.replays.delete(name);
  }
}
