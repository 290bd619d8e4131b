import { sleepUnlessAborted } from "../../shared/retry/retry";
import type { IncrementalSlotPipeline } from "./incrementalSlotPipeline";

export type CycleTriggerOptions = {
  intervalMs: number;
  maxCycles?: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type CycleTriggerSummary = {
  cycles: number;
  slotsConsumed: number;
};

/**
 * Runs cycles one after another with `intervalMs` between them until stopped
 * or `maxCycles` is reached. A failed cycle ends the run by throwing its
 * CycleAbortedError; a cancelled one just ends the loop.
 */
export const runCycles = async (
  pipeline: IncrementalSlotPipeline,
  opts: CycleTriggerOptions
): Promise<CycleTriggerSummary> => {
  const { intervalMs, maxCycles, signal, sleep = sleepUnlessAborted } = opts;
  let cycles = 0;
  let slotsConsumed = 0;

  while (!signal?.aborted) {
    const outcome = await pipeline.runCycle(signal);
    if (outcome.status === "failure") {
      if (outcome.error.kind === "cancelled") break;
      throw outcome.error;
    }

    cycles += 1;
    slotsConsumed += outcome.consumedSlots.length;
    if (maxCycles != null && cycles >= maxCycles) break;

    await sleep(intervalMs, signal);
  }

  return { cycles, slotsConsumed };
};
