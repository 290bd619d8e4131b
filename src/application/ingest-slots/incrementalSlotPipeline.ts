import { RangeCursor } from "../../core/cursor/RangeCursor";
import type { FetchResult, Slot } from "../../core/slots/slot.types";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { LineSink } from "../../ports/LineSink";
import type { SlotConnector } from "../../ports/SlotConnector";
import { createLimiter } from "../../shared/concurrency/limiter";
import {
  cancelledCycle,
  classifyFetchFailure,
  createCycleSummaryTracker,
  CycleAbortedError,
  type CycleSummary,
  type PermanentFailure,
  PipelineAbortedError,
  wrapCommitFailure,
  wrapListFailure,
  wrapUnitFailure
} from "./ingest.error-handler";
import { retryConnectorCall, type RetryTuning } from "./ingest.retry";
import { type PipelineConfig, type PipelineConfigInput, resolvePipelineConfig } from "./pipeline.config";
import { runSlotFetchUnit } from "./slotFetchUnit";

export type PipelineState = "idle" | "listing" | "filtering" | "fetching" | "committing" | "aborted";

export type CycleOutcome =
  | {
      status: "success";
      consumedSlots: Slot[];
      cursor: RangeCursor;
      summary: CycleSummary;
    }
  | {
      status: "failure";
      error: CycleAbortedError;
    };

export type PipelineStats = {
  cyclesCompleted: number;
  cyclesAborted: number;
  bytesRead: number;
  recordsRead: number;
};

export type IncrementalSlotPipelineDeps = {
  pipelineId: string;
  connector: SlotConnector;
  sink: LineSink;
  checkpointStore: CheckpointStore;
  cursor: RangeCursor;
  config?: PipelineConfigInput;
  retryTuning?: RetryTuning;
};

export type OpenPipelineDeps = Omit<IncrementalSlotPipelineDeps, "cursor"> & {
  initialCursor: RangeCursor;
};

/**
 * One ingestion cycle: list, filter against the cursor, fetch every eligible
 * slot, then deliver and move the cursor. A cycle either commits entirely or
 * leaves the cursor where it was.
 */
export class IncrementalSlotPipeline {
  readonly pipelineId: string;
  private readonly connector: SlotConnector;
  private readonly sink: LineSink;
  private readonly checkpointStore: CheckpointStore;
  private readonly config: PipelineConfig;
  private readonly retryTuning?: RetryTuning;

  private currentCursor: RangeCursor;
  private currentState: PipelineState = "idle";
  private queue: Promise<unknown> = Promise.resolve();
  private totals: PipelineStats = { cyclesCompleted: 0, cyclesAborted: 0, bytesRead: 0, recordsRead: 0 };

  constructor(deps: IncrementalSlotPipelineDeps) {
    this.pipelineId = deps.pipelineId;
    this.connector = deps.connector;
    this.sink = deps.sink;
    this.checkpointStore = deps.checkpointStore;
    this.config = resolvePipelineConfig(deps.config);
    this.retryTuning = deps.retryTuning;
    this.currentCursor = deps.cursor;
  }

  /** Resumes from the stored checkpoint if there is one, else starts at `initialCursor`. */
  static async open(deps: OpenPipelineDeps): Promise<IncrementalSlotPipeline> {
    const { initialCursor, ...rest } = deps;
    const stored = await deps.checkpointStore.load(deps.pipelineId);
    const cursor = stored ? RangeCursor.fromCheckpoint(stored) : initialCursor;

    if (stored) {
      console.log(JSON.stringify({ event: "ingest.checkpoint_resumed", pipelineId: deps.pipelineId, ...stored }));
    }

    return new IncrementalSlotPipeline({ ...rest, cursor });
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get cursor(): RangeCursor {
    return this.currentCursor;
  }

  stats(): PipelineStats {
    return { ...this.totals };
  }

  /**
   * Runs one cycle. Calls made while a cycle is outstanding wait for it, so
   * cycles never overlap. Throws PipelineAbortedError once a cycle has failed.
   */
  runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const run = this.queue.then(() => this.executeCycle(signal));
    // The caller gets the rejection through `run`; the queue only orders cycles.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async executeCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    if (this.currentState === "aborted") {
      throw new PipelineAbortedError(this.pipelineId);
    }

    const startedAt = Date.now();
    const tracker = createCycleSummaryTracker();
    const cursorAtStart = this.currentCursor;

    try {
      if (signal?.aborted) throw cancelledCycle(this.pipelineId);

      this.currentState = "listing";
      const listed = await this.listSlots(signal);
      tracker.setListed(listed.length);

      this.currentState = "filtering";
      const eligible = cursorAtStart.filter(listed);
      tracker.setEligible(eligible.length);

      this.currentState = "fetching";
      const results = await this.fetchAll(eligible, signal);
      for (const result of results) tracker.addFetched(result);
      if (signal?.aborted) throw cancelledCycle(this.pipelineId);

      this.currentState = "committing";
      const next = await this.commit(cursorAtStart, results);

      this.currentCursor = next;
      this.currentState = "idle";
      const summary = tracker.summary();
      this.totals.cyclesCompleted += 1;
      this.totals.bytesRead += summary.bytesRead;
      this.totals.recordsRead += summary.recordsRead;

      console.log(JSON.stringify({
        event: "ingest.cycle_completed",
        pipelineId: this.pipelineId,
        ...summary,
        watermark: next.watermark.toISOString(),
        durationMs: Date.now() - startedAt
      }));

      return { status: "success", consumedSlots: eligible, cursor: next, summary };
    } catch (err) {
      this.currentState = "aborted";
      this.totals.cyclesAborted += 1;
      if (!(err instanceof CycleAbortedError)) throw err;

      // eslint-disable-next-line no-console
      console.error(JSON.stringify({
        event: "ingest.cycle_aborted",
        kind: err.kind,
        message: err.message,
        ...err.context,
        watermark: cursorAtStart.watermark.toISOString()
      }));

      return { status: "failure", error: err };
    }
  }

  private async listSlots(signal?: AbortSignal): Promise<Slot[]> {
    try {
      return await retryConnectorCall(
        () => this.connector.list(signal),
        { operation: "list", pipelineId: this.pipelineId },
        this.config,
        { signal, tuning: this.retryTuning }
      );
    } catch (err) {
      if (signal?.aborted) throw cancelledCycle(this.pipelineId);
      throw wrapListFailure(err, this.pipelineId);
    }
  }

  private async fetchAll(eligible: Slot[], signal?: AbortSignal): Promise<FetchResult[]> {
    if (signal?.aborted) throw cancelledCycle(this.pipelineId);
    if (eligible.length === 0) return [];

    // Stops queued units after the first failure, or on an external stop.
    const units = new AbortController();
    const onStop = () => units.abort(signal?.reason);
    signal?.addEventListener("abort", onStop, { once: true });

    // Units failing after the abort were stopped by it; only the first failure is the cause.
    const causes: PermanentFailure[] = [];
    const limit = createLimiter(this.config.concurrency, units.signal);
    try {
      const settled = await Promise.allSettled(
        eligible.map((slot) =>
          limit(async () => {
            try {
              return await runSlotFetchUnit({
                connector: this.connector,
                slot,
                config: this.config,
                pipelineId: this.pipelineId,
                signal: units.signal,
                retryTuning: this.retryTuning
              });
            } catch (err) {
              if (!units.signal.aborted) causes.push(classifyFetchFailure(err, slot));
              units.abort();
              throw err;
            }
          })
        )
      );

      if (signal?.aborted) throw cancelledCycle(this.pipelineId);
      const [cause] = causes;
      if (cause) throw wrapUnitFailure(cause, this.pipelineId);

      return settled.flatMap((result) => (result.status === "fulfilled" ? [result.value] : []));
    } finally {
      signal?.removeEventListener("abort", onStop);
    }
  }

  private async commit(cursorAtStart: RangeCursor, results: FetchResult[]): Promise<RangeCursor> {
    for (const result of results) {
      try {
        await this.sink.write(result.slot, result.lines);
      } catch (err) {
        throw wrapCommitFailure(err, { pipelineId: this.pipelineId, operation: "deliver", slot: result.slot });
      }
    }

    const next = cursorAtStart.advance(results.map((result) => result.slot));
    if (next === cursorAtStart) return next;

    try {
      await this.checkpointStore.save(this.pipelineId, next.toCheckpoint());
    } catch (err) {
      throw wrapCommitFailure(err, { pipelineId: this.pipelineId, operation: "checkpoint" });
    }
    return next;
  }
}
