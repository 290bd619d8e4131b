#!/usr/bin/env node
import { runIngest } from "../composition/root";

type ErrorContext = Partial<{
  pipelineId: string;
  operation: string;
  slot: string;
  attempts: number;
}>;

type CliErrorEnvelope = {
  event: "ingest.failed";
  name: string;
  message: string;
  code?: string;
  kind?: string;
  context?: ErrorContext;
  stack?: string;
};

const stringContextKeys = ["pipelineId", "operation", "slot"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string") {
      sanitizedContext[key] = raw;
    }
  }
  if (typeof value.attempts === "number" && Number.isFinite(value.attempts)) {
    sanitizedContext.attempts = value.attempts;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "ingest.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  if (typeof errorRecord.kind === "string") {
    envelope.kind = errorRecord.kind;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeIngestCli = async (): Promise<void> => {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    const summary = await runIngest(controller.signal);
    console.log(JSON.stringify({ event: "ingest.stopped", ...summary }));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
};

if (require.main === module) {
  void executeIngestCli();
}
