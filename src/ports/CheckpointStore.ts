import type { CursorCheckpoint } from "../core/cursor/RangeCursor";

export interface CheckpointStore {
  load(pipelineId: string): Promise<CursorCheckpoint | null>;
  save(pipelineId: string, checkpoint: CursorCheckpoint): Promise<void>;
}
