import {
  defaultPipelineConfig,
  pipelineCaps,
  type PipelineConfig,
  validatePipelineConfig
} from "../../application/ingest-slots/pipeline.config";

export const runtimeCaps = {
  intervalMs: { min: 0, max: 86_400_000 },
  maxCycles: { min: 1, max: 1_000_000 }
} as const;

export type RuntimeConfig = {
  pipelineConfig: PipelineConfig;
  intervalMs: number;       // 0 runs a single cycle
  maxCycles?: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const pipelineConfig = validatePipelineConfig({
    ...defaultPipelineConfig,
    maxRetries: parseOptionalIntInRange(env, "INGEST_MAX_RETRIES", pipelineCaps.maxRetries) ?? defaultPipelineConfig.maxRetries,
    charset: env.INGEST_CHARSET?.trim() ? env.INGEST_CHARSET.trim().toLowerCase() : defaultPipelineConfig.charset,
    concurrency:
      parseOptionalIntInRange(env, "INGEST_CONCURRENCY", pipelineCaps.concurrency) ?? defaultPipelineConfig.concurrency,
    retryMinDelayMs:
      parseOptionalIntInRange(env, "INGEST_RETRY_MIN_DELAY_MS", pipelineCaps.retryMinDelayMs) ??
      defaultPipelineConfig.retryMinDelayMs,
    retryMaxDelayMs:
      parseOptionalIntInRange(env, "INGEST_RETRY_MAX_DELAY_MS", pipelineCaps.retryMaxDelayMs) ??
      defaultPipelineConfig.retryMaxDelayMs
  });

  const intervalMs = parseOptionalIntInRange(env, "INGEST_INTERVAL_MS", runtimeCaps.intervalMs) ?? 0;
  const maxCycles = parseOptionalIntInRange(env, "INGEST_MAX_CYCLES", runtimeCaps.maxCycles);

  return maxCycles != null ? { pipelineConfig, intervalMs, maxCycles } : { pipelineConfig, intervalMs };
};
