export const DEFAULT_QUEUE_CAPACITY = 100;

export class QueueClosedError extends Error {
  constructor() {
    super("Queue is closed");
    this.name = "QueueClosedError";
  }
}

type Taker<T> = {
  resolve: (item: T) => void;
  reject: (reason: Error) => void;
};

type Offerer<T> = {
  item: T;
  resolve: (accepted: boolean) => void;
};

/**
 * FIFO with a fixed capacity. A full queue makes `offer` wait for room rather
 * than drop; an empty one makes `take` wait for an item.
 */
export class BoundedQueue<T> {
  private readonly items: Array<T> = [];
  private readonly takers: Array<Taker<T>> = [];
  private readonly offerers: Array<Offerer<T>> = [];
  private closedWith: Error | null = null;

  constructor(readonly capacity = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("Queue capacity must be a positive integer");
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  // Resolves true once enqueued, false if the queue was or becomes closed
  offer(item: T): Promise<boolean> {
    if (this.closedWith !== null) return Promise.resolve(false);

    const taker = this.takers.shift();
    if (taker !== undefined) {
      taker.resolve(item);
      return Promise.resolve(true);
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      this.offerers.push({ item, resolve });
    });
  }

  take(): Promise<T> {
    if (this.closedWith !== null) return Promise.reject(this.closedWith);

    const item = this.items.shift();
    if (item !== undefined) {
      this.admitWaitingOfferer();
      return Promise.resolve(item);
    }
    return new Promise((resolve, reject) => {
      this.takers.push({ reject, resolve });
    });
  }

  /**
   * Close the queue. Waiting offers resolve false; waiting and later takes
   * reject with `reason`, or a QueueClosedError when none is given.
   */
  close(reason?: Error): void {
    if (this.closedWith !== null) return;
    const error = reason ?? new QueueClosedError();
    this.closedWith = error;
    this.items.length = 0;
    for (const taker of this.takers.splice(0)) taker.reject(error);
    for (const offerer of this.offerers.splice(0)) offerer.resolve(false);
  }

  private admitWaitingOfferer(): void {
    const offerer = this.offerers.shift();
    if (offerer === undefined) return;
    this.items.push(offerer.item);
    offerer.resolve(true);
  }
}
