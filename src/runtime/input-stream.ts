import { type KeySource } from "../input/key-source";
import { type ParsedKey } from "../input/key-mapping";
import { KeyDecoder } from "../input/machines/key-decoder";
import { debugLog } from "../utils/debug";

import { type Sleep, sleep } from "./clock";
import { quit, userAction, type GameCommand } from "./commands";
import { type BoundedQueue } from "./queue";

export type InputTimings = Readonly<{
  pollIntervalMs: number;
  escapeSequenceWaitMs: number;
  escapeSequenceSecondWaitMs: number;
}>;

export type InputProducerOptions = InputTimings &
  Readonly<{
    signal: AbortSignal;
    sleep?: Sleep;
  }>;

function toCommand(key: ParsedKey): GameCommand | null {
  switch (key.kind) {
    case "Input":
      return userAction(key.input);
    case "Quit":
      return quit;
    case "Unknown":
      return null;
  }
}

/**
 * Poll the key source and offer one command per recognised key. Inside an
 * escape sequence the producer waits a short while for the next byte before
 * giving up on the sequence.
 */
export async function runInputProducer(
  queue: BoundedQueue<GameCommand>,
  source: KeySource,
  options: InputProducerOptions,
): Promise<void> {
  const wait = options.sleep ?? sleep;
  const { signal } = options;
  const decoder = new KeyDecoder();

  while (!signal.aborted) {
    const byte = source.read();
    if (byte === null) {
      if (!(await wait(options.pollIntervalMs, signal))) break;
      continue;
    }

    const keys: Array<ParsedKey> = [...decoder.feed(byte)];
    while (decoder.isInSequence) {
      const waitMs =
        decoder.state === "escape"
          ? options.escapeSequenceWaitMs
          : options.escapeSequenceSecondWaitMs;
      if (!(await wait(waitMs, signal))) return;
      const next = source.available() > 0 ? source.read() : null;
      keys.push(...(next === null ? decoder.timeout() : decoder.feed(next)));
    }

    for (const key of keys) {
      const command = toCommand(key);
      if (command === null) {
        debugLog("input", "ignored key", key);
        continue;
      }
      if (!(await queue.offer(command))) return;
    }
  }
}
