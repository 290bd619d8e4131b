import { DecodeFailure } from "../../core/decode/contentDecoder";
import type { Slot } from "../../core/slots/slot.types";
import { RetryExhaustedError } from "../../shared/retry/retry";

export type CycleFailureKind = "list" | "fetch" | "commit" | "cancelled";
export type SlotOperation = "list" | "fetch" | "decode" | "deliver" | "checkpoint";

export type CycleErrorContext = {
  pipelineId: string;
  operation?: SlotOperation;
  slot?: string;
  attempts?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const attemptsOf = (reason: unknown): number | undefined =>
  reason instanceof RetryExhaustedError ? reason.attempts : undefined;

/** A slot that could not be fetched or decoded; fatal to its cycle. */
export class PermanentFailure extends Error {
  readonly slot: Slot;
  readonly operation: SlotOperation;
  readonly cause: unknown;

  constructor(slot: Slot, operation: SlotOperation, cause: unknown) {
    super(`Slot ${slot.identifier} failed during ${operation}: ${toErrorMessage(cause)}`);
    this.name = "PermanentFailure";
    this.slot = slot;
    this.operation = operation;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CycleAbortedError extends Error {
  readonly code: `cycle_${CycleFailureKind}_failed`;
  readonly kind: CycleFailureKind;
  readonly context: CycleErrorContext;
  readonly cause?: unknown;

  constructor(args: { kind: CycleFailureKind; message: string; context: CycleErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "CycleAbortedError";
    this.code = `cycle_${args.kind}_failed`;
    this.kind = args.kind;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PipelineAbortedError extends Error {
  readonly pipelineId: string;

  constructor(pipelineId: string) {
    super(`Pipeline ${pipelineId} was aborted; reopen it from its checkpoint to resume`);
    this.name = "PipelineAbortedError";
    this.pipelineId = pipelineId;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const classifyFetchFailure = (reason: unknown, slot: Slot): PermanentFailure => {
  if (reason instanceof PermanentFailure) return reason;
  if (reason instanceof DecodeFailure) return new PermanentFailure(slot, "decode", reason);
  return new PermanentFailure(slot, "fetch", reason);
};

export const wrapListFailure = (reason: unknown, pipelineId: string): CycleAbortedError => {
  const attempts = attemptsOf(reason);
  return new CycleAbortedError({
    kind: "list",
    message: `Listing slots failed for pipeline=${pipelineId}: ${toErrorMessage(reason)}`,
    context: { pipelineId, operation: "list", ...(attempts != null ? { attempts } : {}) },
    cause: reason instanceof RetryExhaustedError ? reason.cause : reason
  });
};

export const wrapUnitFailure = (failure: PermanentFailure, pipelineId: string): CycleAbortedError => {
  const attempts = attemptsOf(failure.cause);
  return new CycleAbortedError({
    kind: "fetch",
    message: `Cycle aborted for pipeline=${pipelineId}: ${failure.message}`,
    context: {
      pipelineId,
      operation: failure.operation,
      slot: failure.slot.identifier,
      ...(attempts != null ? { attempts } : {})
    },
    cause: failure.cause instanceof RetryExhaustedError ? failure.cause.cause : failure.cause
  });
};

export const wrapCommitFailure = (
  reason: unknown,
  context: { pipelineId: string; operation: "deliver" | "checkpoint"; slot?: Slot }
): CycleAbortedError =>
  new CycleAbortedError({
    kind: "commit",
    message: `Commit failed during ${context.operation} for pipeline=${context.pipelineId}: ${toErrorMessage(reason)}`,
    context: {
      pipelineId: context.pipelineId,
      operation: context.operation,
      ...(context.slot ? { slot: context.slot.identifier } : {})
    },
    cause: reason
  });

export const cancelledCycle = (pipelineId: string): CycleAbortedError =>
  new CycleAbortedError({
    kind: "cancelled",
    message: `Cycle cancelled for pipeline=${pipelineId} before commit`,
    context: { pipelineId }
  });

export type CycleSummary = {
  slotsListed: number;
  slotsEligible: number;
  slotsFetched: number;
  bytesRead: number;
  recordsRead: number;
};

export const createCycleSummaryTracker = () => {
  let slotsListed = 0;
  let slotsEligible = 0;
  let slotsFetched = 0;
  let bytesRead = 0;
  let recordsRead = 0;

  return {
    setListed: (count: number) => {
      slotsListed = count;
    },
    setEligible: (count: number) => {
      slotsEligible = count;
    },
    addFetched: (result: { bytesRead: number; recordsRead: number }) => {
      slotsFetched += 1;
      bytesRead += result.bytesRead;
      recordsRead += result.recordsRead;
    },
    summary: (): CycleSummary => ({
      slotsListed,
      slotsEligible,
      slotsFetched,
      bytesRead,
      recordsRead
    })
  };
};
