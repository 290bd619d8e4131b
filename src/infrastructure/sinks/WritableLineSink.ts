import { once } from "events";
import { createWriteStream } from "fs";
import type { Writable } from "stream";
import { finished } from "stream/promises";
import type { Slot } from "../../core/slots/slot.types";
import type { LineSink } from "../../ports/LineSink";

const asError = (reason: unknown): Error => (reason instanceof Error ? reason : new Error(String(reason)));

/**
 * Writes every line followed by a newline, honouring backpressure.
 * `write` resolves only once the stream has accepted the slot's last line; any
 * stream error fails the current and every later `write`.
 */
export class WritableLineSink implements LineSink {
  private failure?: Error;
  private readonly ready: Promise<void>;

  constructor(
    private readonly out: Writable = process.stdout,
    private readonly ownsStream = false,
    ready: Promise<unknown> = Promise.resolve()
  ) {
    out.on("error", (err) => this.record(err));
    this.ready = ready.then(
      () => undefined,
      (err: unknown) => this.record(err)
    );
  }

  /** Appends to a file; the file is closed by `close()`. */
  static toFile(filePath: string): WritableLineSink {
    const stream = createWriteStream(filePath, { flags: "a" });
    return new WritableLineSink(stream, true, once(stream, "open"));
  }

  async write(_slot: Slot, lines: readonly string[]): Promise<void> {
    await this.ready;
    this.throwIfFailed();

    let written: Promise<void> = Promise.resolve();
    for (const line of lines) {
      const sent = this.send(`${line}\n`);
      written = sent.written;
      if (!sent.accepted) await this.waitForDrain();
      this.throwIfFailed();
    }

    await written;
    this.throwIfFailed();
  }

  async close(): Promise<void> {
    if (!this.ownsStream) return;
    if (this.failure || this.out.destroyed) {
      this.out.destroy();
      return;
    }
    this.out.end();
    await finished(this.out);
  }

  private send(chunk: string): { accepted: boolean; written: Promise<void> } {
    let settle: () => void = () => undefined;
    const written = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const accepted = this.out.write(chunk, (err) => {
      if (err) this.record(err);
      settle();
    });
    return { accepted, written };
  }

  private record(err: unknown): void {
    this.failure ??= asError(err);
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
  }

  private waitForDrain(): Promise<void> {
    if (this.failure || this.out.destroyed) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = () => {
        this.out.off("drain", done);
        this.out.off("error", done);
        this.out.off("close", done);
        resolve();
      };
      this.out.once("drain", done);
      this.out.once("error", done);
      this.out.once("close", done);
    });
  }
}
