/**
 * Checkpoints are keyed by `_id = pipelineId`, which Mongo already indexes.
 * `updatedAt` supports finding stale pipelines.
 */
export const mongoIndexes = {
  checkpointCollection: [
    { keys: { updatedAt: 1 }, options: {} }
  ]
};
