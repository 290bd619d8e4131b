import { Readable, pipeline } from "stream";
import { createGunzip } from "zlib";
import type { SlotContent } from "../slots/slot.types";

export const GZIP_MAGIC = [0x1f, 0x8b] as const;
export const DEFAULT_CHARSET = "utf-8";

export class DecodeFailure extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "DecodeFailure";
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type DecodeOptions = {
  charset?: string;
  onBytesRead?: (bytes: number) => void;
};

export const isSupportedCharset = (charset: string): boolean => {
  try {
    new TextDecoder(charset);
    return true;
  } catch {
    return false;
  }
};

const isZlibError = (err: unknown): boolean => {
  if (typeof err !== "object" || err == null || !("code" in err)) return false;
  return typeof err.code === "string" && err.code.startsWith("Z_");
};

async function* singleChunk(bytes: Uint8Array): AsyncGenerator<Uint8Array> {
  yield bytes;
}

type ProbedContent = {
  gzip: boolean;
  bytes: AsyncIterable<Uint8Array>;
};

/**
 * Reads just enough of the content to see the first two bytes, then hands back
 * a stream that replays them ahead of the rest. Fewer than two bytes means raw.
 */
const probeGzip = async (content: SlotContent): Promise<ProbedContent> => {
  const source = content instanceof Uint8Array ? singleChunk(content) : content;
  const iterator = source[Symbol.asyncIterator]();

  const head: Uint8Array[] = [];
  let headLength = 0;
  let exhausted = false;
  while (headLength < GZIP_MAGIC.length) {
    const next = await iterator.next();
    if (next.done) {
      exhausted = true;
      break;
    }
    head.push(next.value);
    headLength += next.value.length;
  }

  const headBytes = Buffer.concat(head);
  const gzip =
    headBytes.length >= GZIP_MAGIC.length &&
    headBytes[0] === GZIP_MAGIC[0] &&
    headBytes[1] === GZIP_MAGIC[1];

  async function* replay(): AsyncGenerator<Uint8Array> {
    let finished = exhausted;
    try {
      if (headBytes.length > 0) yield headBytes;
      while (!finished) {
        const next = await iterator.next();
        if (next.done) {
          finished = true;
          break;
        }
        yield next.value;
      }
    } finally {
      if (!finished) await iterator.return?.();
    }
  }

  return { gzip, bytes: replay() };
};

async function* gunzip(bytes: AsyncIterable<Uint8Array>): AsyncGenerator<Uint8Array> {
  const inflater = createGunzip();
  // Failures on either side destroy the inflater and surface through its iteration below.
  pipeline(Readable.from(bytes), inflater, () => undefined);

  try {
    for await (const chunk of inflater) {
      yield chunk;
    }
  } catch (err) {
    if (isZlibError(err)) {
      throw new DecodeFailure(`Malformed gzip content: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    throw err;
  } finally {
    inflater.destroy();
  }
}

const stripCarriageReturn = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line);

/**
 * Yields the text lines of a slot's content, transparently inflating gzip.
 * Lines carry no terminator; an unterminated last line is still emitted.
 */
export async function* decodeLines(content: SlotContent, options: DecodeOptions = {}): AsyncGenerator<string> {
  const decoder = new TextDecoder(options.charset ?? DEFAULT_CHARSET);
  const probed = await probeGzip(content);
  const bytes = probed.gzip ? gunzip(probed.bytes) : probed.bytes;

  let pending = "";
  for await (const chunk of bytes) {
    options.onBytesRead?.(chunk.length);
    pending += decoder.decode(chunk, { stream: true });

    const parts = pending.split("\n");
    pending = parts.pop() ?? "";
    for (const part of parts) {
      yield stripCarriageReturn(part);
    }
  }

  pending += decoder.decode();
  if (pending.length > 0) {
    yield stripCarriageReturn(pending);
  }
}
