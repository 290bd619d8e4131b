import { runCycles, type CycleTriggerSummary } from "../application/ingest-slots/cycleTrigger";
import { IncrementalSlotPipeline } from "../application/ingest-slots/incrementalSlotPipeline";
import { RangeCursor } from "../core/cursor/RangeCursor";
import { createConnector } from "../infrastructure/connectors/connector.factory";
import { MongoCheckpointStore } from "../infrastructure/mongo/MongoCheckpointStore";
import { WritableLineSink } from "../infrastructure/sinks/WritableLineSink";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const runIngest = async (signal?: AbortSignal): Promise<CycleTriggerSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const connector = createConnector(env.INGEST_CONNECTOR, env.INGEST_CONNECTOR_PARAMS);
  const checkpointStore = new MongoCheckpointStore(env.MONGO_URI);
  const sink = env.INGEST_OUTPUT ? WritableLineSink.toFile(env.INGEST_OUTPUT) : new WritableLineSink();

  try {
    const pipeline = await IncrementalSlotPipeline.open({
      pipelineId: env.INGEST_PIPELINE_ID,
      connector,
      sink,
      checkpointStore,
      initialCursor: RangeCursor.from(env.INGEST_START_DATE, env.INGEST_EXCLUDED_SLOTS),
      config: runtime.pipelineConfig
    });

    return await runCycles(pipeline, {
      intervalMs: runtime.intervalMs,
      maxCycles: runtime.intervalMs === 0 ? 1 : runtime.maxCycles,
      signal
    });
  } finally {
    await sink.close();
    await checkpointStore.close();
  }
};
