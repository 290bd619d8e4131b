import { decodeLines } from "../../core/decode/contentDecoder";
import type { FetchResult, Slot, SlotContent } from "../../core/slots/slot.types";
import type { SlotConnector } from "../../ports/SlotConnector";
import { classifyFetchFailure } from "./ingest.error-handler";
import { retryConnectorCall, type RetryTuning } from "./ingest.retry";
import type { PipelineConfig } from "./pipeline.config";

export type SlotFetchUnitDeps = {
  connector: SlotConnector;
  slot: Slot;
  config: Pick<PipelineConfig, "maxRetries" | "charset" | "retryMinDelayMs" | "retryMaxDelayMs">;
  pipelineId?: string;
  signal?: AbortSignal;
  retryTuning?: RetryTuning;
};

// Leaving a for-await early calls return() on the iterator, which destroys
// node streams; every exit path below releases the content that way.
const readFully = async (content: SlotContent, signal?: AbortSignal): Promise<Uint8Array> => {
  if (content instanceof Uint8Array) return content;

  const chunks: Uint8Array[] = [];
  for await (const chunk of content) {
    signal?.throwIfAborted();
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
};

/**
 * Fetches one slot under the retry budget, then decodes it into lines.
 * The whole download is part of each attempt, so a stream that breaks halfway
 * is retried from the start. Every failure surfaces as PermanentFailure.
 */
export const runSlotFetchUnit = async (deps: SlotFetchUnitDeps): Promise<FetchResult> => {
  const { connector, slot, config, signal } = deps;

  try {
    const bytes = await retryConnectorCall(
      async () => readFully(await connector.fetch(slot, signal), signal),
      { operation: "fetch", pipelineId: deps.pipelineId, slot: slot.identifier },
      config,
      { signal, tuning: deps.retryTuning }
    );

    let bytesRead = 0;
    const lines: string[] = [];
    for await (const line of decodeLines(bytes, {
      charset: config.charset,
      onBytesRead: (count) => {
        bytesRead += count;
      }
    })) {
      lines.push(line);
    }

    return { slot, lines, bytesRead, recordsRead: lines.length };
  } catch (err) {
    throw classifyFetchFailure(err, slot);
  }
};
