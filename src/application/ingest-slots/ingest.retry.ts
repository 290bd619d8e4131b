import { retry, type RetryOptions } from "../../shared/retry/retry";
import type { PipelineConfig } from "./pipeline.config";

export type RetryTarget = {
  operation: "list" | "fetch";
  pipelineId?: string;
  slot?: string;
};

export type RetryTuning = Pick<RetryOptions, "randomFn" | "sleep" | "jitterRatio">;

const errorStatus = (error: unknown): number | null => {
  if (typeof error !== "object" || error == null || !("status" in error)) return null;
  return typeof error.status === "number" ? error.status : null;
};

const errorName = (error: unknown): string => (error instanceof Error ? error.name : typeof error);

/**
 * Runs a connector call under the pipeline's retry budget and logs each retry
 * and the final give-up as structured events.
 */
export const retryConnectorCall = <T>(
  fn: () => Promise<T>,
  target: RetryTarget,
  config: Pick<PipelineConfig, "maxRetries" | "retryMinDelayMs" | "retryMaxDelayMs">,
  options: { signal?: AbortSignal; tuning?: RetryTuning } = {}
): Promise<T> =>
  retry(fn, {
    retries: config.maxRetries,
    minDelayMs: config.retryMinDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
    signal: options.signal,
    ...options.tuning,
    onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "ingest.retry",
        ...target,
        error: errorName(error),
        status: errorStatus(error),
        attempt,
        maxAttempts,
        delayMs
      }));
    },
    onGiveUp: ({ attempt, maxAttempts, error, exhausted }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "ingest.give_up",
        ...target,
        error: errorName(error),
        status: errorStatus(error),
        attempt,
        maxAttempts,
        exhausted
      }));
    }
  });
