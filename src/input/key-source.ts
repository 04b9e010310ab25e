import { debugLog } from "../utils/debug";

// Non-blocking byte source the input producer polls
export type KeySource = {
  // Number of bytes ready to read
  available(): number;
  // Next byte, or null when none is buffered
  read(): number | null;
};

/**
 * Buffers bytes from a TTY stream in raw mode. `close` restores the previous
 * mode and detaches from the stream.
 */
export class StdinKeySource implements KeySource {
  private readonly buffer: Array<number> = [];
  private readonly onData = (chunk: Buffer): void => {
    this.buffer.push(...chunk);
  };
  private readonly wasRaw: boolean;

  constructor(private readonly stream: NodeJS.ReadStream = process.stdin) {
    this.wasRaw = stream.isRaw;
    if (stream.isTTY) stream.setRawMode(true);
    stream.on("data", this.onData);
    stream.resume();
    debugLog("input", "stdin attached", { tty: stream.isTTY });
  }

  available(): number {
    return this.buffer.length;
  }

  read(): number | null {
    return this.buffer.shift() ?? null;
  }

  close(): void {
    this.stream.off("data", this.onData);
    if (this.stream.isTTY) this.stream.setRawMode(this.wasRaw);
    this.stream.pause();
  }
}

// Source backed by a fixed list of bytes
export class ArrayKeySource implements KeySource {
  private index = 0;

  constructor(private readonly bytes: ReadonlyArray<number>) {}

  available(): number {
    return this.bytes.length - this.index;
  }

  read(): number | null {
    const byte = this.bytes[this.index];
    if (byte === undefined) return null;
    this.index++;
    return byte;
  }
}
