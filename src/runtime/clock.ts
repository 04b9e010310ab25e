import { debugLog } from "../utils/debug";

import { timeTick, type GameCommand } from "./commands";
import { type IntervalCell } from "./interval-cell";
import { type BoundedQueue } from "./queue";

/**
 * Wait `ms` milliseconds. Resolves true when the time elapsed and false when
 * the signal aborted first.
 */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<boolean>;

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export type TickProducerOptions = Readonly<{
  signal: AbortSignal;
  sleep?: Sleep;
}>;

/**
 * Offer a TimeTick after every drop interval. The interval is re-read before
 * each wait so level changes take effect on the next tick.
 */
export async function runTickProducer(
  queue: BoundedQueue<GameCommand>,
  interval: IntervalCell,
  options: TickProducerOptions,
): Promise<void> {
  const wait = options.sleep ?? sleep;
  while (!options.signal.aborted) {
    const elapsed = await wait(interval.get(), options.signal);
    if (!elapsed) break;
    const accepted = await queue.offer(timeTick);
    if (!accepted) break;
  }
  debugLog("session", "tick producer stopped");
}
