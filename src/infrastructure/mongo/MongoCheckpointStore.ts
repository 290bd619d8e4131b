import type { Collection, MongoClient } from "mongodb";
import type { CursorCheckpoint } from "../../core/cursor/RangeCursor";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type CheckpointDoc = {
  _id: string;                   // pipeline id
  watermark: Date;
  excludedAtWatermark: string[];
  updatedAt: Date;
};

export const toCheckpointDoc = (pipelineId: string, checkpoint: CursorCheckpoint, now: Date): CheckpointDoc => ({
  _id: pipelineId,
  watermark: new Date(checkpoint.watermark),
  excludedAtWatermark: [...checkpoint.excludedAtWatermark],
  updatedAt: now
});

export const fromCheckpointDoc = (doc: Pick<CheckpointDoc, "watermark" | "excludedAtWatermark">): CursorCheckpoint => ({
  watermark: doc.watermark.toISOString(),
  excludedAtWatermark: [...doc.excludedAtWatermark]
});

/** One document per pipeline; a save replaces the watermark and its exclusions together. */
export class MongoCheckpointStore implements CheckpointStore {
  private client?: MongoClient;
  private collection?: Collection<CheckpointDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "slot_ingest",
    private readonly collectionName = "checkpoints",
    private readonly now: () => Date = () => new Date()
  ) {}

  private async getCollection(): Promise<Collection<CheckpointDoc>> {
    if (this.collection) return this.collection;

    this.client = await createMongoClient(this.mongoUri);

    const db = this.client.db(this.dbName);
    const col = db.collection<CheckpointDoc>(this.collectionName);

    for (const idx of mongoIndexes.checkpointCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async load(pipelineId: string): Promise<CursorCheckpoint | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: pipelineId });
    return doc ? fromCheckpointDoc(doc) : null;
  }

  async save(pipelineId: string, checkpoint: CursorCheckpoint): Promise<void> {
    const col = await this.getCollection();
    const doc = toCheckpointDoc(pipelineId, checkpoint, this.now());
    await col.replaceOne({ _id: pipelineId }, doc, { upsert: true });
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
