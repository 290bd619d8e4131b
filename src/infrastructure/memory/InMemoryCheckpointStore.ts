import type { CursorCheckpoint } from "../../core/cursor/RangeCursor";
import type { CheckpointStore } from "../../ports/CheckpointStore";

const copy = (checkpoint: CursorCheckpoint): CursorCheckpoint => ({
  watermark: checkpoint.watermark,
  excludedAtWatermark: [...checkpoint.excludedAtWatermark]
});

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, CursorCheckpoint>();

  constructor(initial: Record<string, CursorCheckpoint> = {}) {
    for (const [pipelineId, checkpoint] of Object.entries(initial)) {
      this.checkpoints.set(pipelineId, copy(checkpoint));
    }
  }

  async load(pipelineId: string): Promise<CursorCheckpoint | null> {
    const checkpoint = this.checkpoints.get(pipelineId);
    return checkpoint ? copy(checkpoint) : null;
  }

  async save(pipelineId: string, checkpoint: CursorCheckpoint): Promise<void> {
    this.checkpoints.set(pipelineId, copy(checkpoint));
  }
}
