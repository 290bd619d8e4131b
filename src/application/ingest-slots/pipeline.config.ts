import { DEFAULT_CHARSET, isSupportedCharset } from "../../core/decode/contentDecoder";

export type PipelineConfig = {
  maxRetries: number;        // shared by list and fetch, on top of the first try
  charset: string;
  concurrency: number;       // slots fetched at once within a cycle
  retryMinDelayMs: number;
  retryMaxDelayMs: number;
};

export type PipelineConfigInput = Partial<PipelineConfig>;

export const defaultPipelineConfig: PipelineConfig = {
  maxRetries: 3,
  charset: DEFAULT_CHARSET,
  concurrency: 4,
  retryMinDelayMs: 250,
  retryMaxDelayMs: 5000
};

export const pipelineCaps = {
  maxRetries: { min: 0, max: 20 },
  concurrency: { min: 1, max: 32 },
  retryMinDelayMs: { min: 0, max: 60000 },
  retryMaxDelayMs: { min: 0, max: 300000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  assertIntegerInRange("maxRetries", config.maxRetries, pipelineCaps.maxRetries.min, pipelineCaps.maxRetries.max);
  assertIntegerInRange("concurrency", config.concurrency, pipelineCaps.concurrency.min, pipelineCaps.concurrency.max);
  assertIntegerInRange(
    "retryMinDelayMs",
    config.retryMinDelayMs,
    pipelineCaps.retryMinDelayMs.min,
    pipelineCaps.retryMinDelayMs.max
  );
  assertIntegerInRange(
    "retryMaxDelayMs",
    config.retryMaxDelayMs,
    config.retryMinDelayMs,
    pipelineCaps.retryMaxDelayMs.max
  );
  if (!isSupportedCharset(config.charset)) {
    throw new Error(`charset=${config.charset} is not a supported text encoding`);
  }
  return config;
};

const normalizeCharset = (value: string | undefined): string => {
  if (typeof value !== "string") return DEFAULT_CHARSET;
  const normalized = value.trim().toLowerCase();
  return normalized === "" ? DEFAULT_CHARSET : normalized;
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({
    ...defaultPipelineConfig,
    ...input,
    charset: normalizeCharset(input.charset)
  });
