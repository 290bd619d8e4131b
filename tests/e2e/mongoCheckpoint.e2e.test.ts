import { MongoClient } from "mongodb";
import { IncrementalSlotPipeline } from "../../src/application/ingest-slots/incrementalSlotPipeline";
import { RangeCursor } from "../../src/core/cursor/RangeCursor";
import { MongoCheckpointStore, type CheckpointDoc } from "../../src/infrastructure/mongo/MongoCheckpointStore";
import { createCollectingSink, createDateConnector, day, fastRetries, silenceConsole, slot } from "../support/slotFakes";

const run = process.env.REQUIRE_MONGO_E2E === "1";

(run ? describe : describe.skip)("checkpoint store (mongo e2e)", () => {
  const mongoUri = process.env.MONGO_URI ?? "mongodb://127.0.0.1:27017/slot-ingest";
  const dbName = "slot_ingest_e2e";
  const colName = "checkpoints";

  let client: MongoClient;
  let restoreConsole: () => void;

  beforeAll(async () => {
    client = new MongoClient(mongoUri);
    await client.connect();
  });

  beforeEach(async () => {
    restoreConsole = silenceConsole();
    await client.db(dbName).collection(colName).deleteMany({});
  });

  afterEach(() => {
    restoreConsole();
  });

  afterAll(async () => {
    await client.close();
  });

  it("persists the cursor and resumes from it after a restart", async () => {
    const fake = createDateConnector([slot("/files/example_20161201.txt", "2016-12-01")]);
    const first = createCollectingSink();
    const store = new MongoCheckpointStore(mongoUri, dbName, colName);

    try {
      const pipeline = await IncrementalSlotPipeline.open({
        pipelineId: "e2e",
        connector: fake.connector,
        sink: first.sink,
        checkpointStore: store,
        initialCursor: RangeCursor.from(day("2016-01-01")),
        config: fastRetries
      });
      await pipeline.runCycle();
    } finally {
      await store.close();
    }

    const persisted = await client.db(dbName).collection<CheckpointDoc>(colName).findOne({ _id: "e2e" });
    expect(persisted?.watermark).toEqual(new Date("2016-12-01T00:00:00.000Z"));
    expect(persisted?.excludedAtWatermark).toEqual(["/files/example_20161201.txt"]);

    fake.setSlots([
      slot("/files/example_20161201.txt", "2016-12-01"),
      slot("/files/example_20161202.txt", "2016-12-02")
    ]);
    const second = createCollectingSink();
    const reopenedStore = new MongoCheckpointStore(mongoUri, dbName, colName);
    try {
      const reopened = await IncrementalSlotPipeline.open({
        pipelineId: "e2e",
        connector: fake.connector,
        sink: second.sink,
        checkpointStore: reopenedStore,
        initialCursor: RangeCursor.from(day("2016-01-01")),
        config: fastRetries
      });
      await reopened.runCycle();
    } finally {
      await reopenedStore.close();
    }

    expect(first.deliveries).toEqual(["/files/example_20161201.txt"]);
    expect(second.deliveries).toEqual(["/files/example_20161202.txt"]);
  });
});
