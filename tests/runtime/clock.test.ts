import { type Sleep, runTickProducer, sleep } from "@/runtime/clock";
import { type GameCommand } from "@/runtime/commands";
import { IntervalCell } from "@/runtime/interval-cell";
import { BoundedQueue } from "@/runtime/queue";

describe("@/runtime/clock — sleep", () => {
  test("resolves true once the time has passed", async () => {
    expect(await sleep(1, new AbortController().signal)).toBe(true);
  });

  test("resolves false at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await sleep(60_000, controller.signal)).toBe(false);
  });

  test("resolves false when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();

    expect(await pending).toBe(false);
  });
});

describe("@/runtime/clock — runTickProducer", () => {
  test("offers a tick per interval and re-reads the interval every time", async () => {
    const queue = new BoundedQueue<GameCommand>(10);
    const interval = new IntervalCell(1000);
    const waits: Array<number> = [];
    const fakeSleep: Sleep = (ms) => {
      waits.push(ms);
      if (waits.length === 2) interval.set(500);
      return Promise.resolve(waits.length < 4);
    };

    await runTickProducer(queue, interval, {
      signal: new AbortController().signal,
      sleep: fakeSleep,
    });

    expect(waits).toEqual([1000, 1000, 500, 500]);
    expect(queue.size).toBe(3);
    expect(await queue.take()).toEqual({ kind: "TimeTick" });
  });

  test("stops once the queue is closed", async () => {
    const queue = new BoundedQueue<GameCommand>(10);
    queue.close();
    let waits = 0;
    const fakeSleep: Sleep = () => {
      waits++;
      return Promise.resolve(true);
    };

    await runTickProducer(queue, new IntervalCell(100), {
      signal: new AbortController().signal,
      sleep: fakeSleep,
    });

    expect(waits).toBe(1);
  });

  test("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fakeSleep = jest.fn<Promise<boolean>, [number, AbortSignal]>(() =>
      Promise.resolve(true),
    );

    await runTickProducer(new BoundedQueue<GameCommand>(1), new IntervalCell(100), {
      signal: controller.signal,
      sleep: fakeSleep,
    });

    expect(fakeSleep).not.toHaveBeenCalled();
  });
});
