import {
  cancelledCycle,
  classifyFetchFailure,
  createCycleSummaryTracker,
  CycleAbortedError,
  PermanentFailure,
  wrapCommitFailure,
  wrapListFailure,
  wrapUnitFailure
} from "../../src/application/ingest-slots/ingest.error-handler";
import { DecodeFailure } from "../../src/core/decode/contentDecoder";
import { RetryExhaustedError } from "../../src/shared/retry/retry";
import { slot } from "../support/slotFakes";

const first = slot("/files/a.txt", "2016-12-01");
const second = slot("/files/b.txt", "2016-12-02");

describe("ingest.error-handler", () => {
  it("classifies decode failures separately from fetch failures", () => {
    const decode = classifyFetchFailure(new DecodeFailure("Malformed gzip content: unexpected end of file"), first);
    const fetch = classifyFetchFailure(new Error("socket hang up"), first);

    expect(decode.operation).toBe("decode");
    expect(decode.message).toBe("Slot /files/a.txt failed during decode: Malformed gzip content: unexpected end of file");
    expect(fetch.operation).toBe("fetch");
    expect(fetch.message).toBe("Slot /files/a.txt failed during fetch: socket hang up");
  });

  it("passes an existing PermanentFailure through untouched", () => {
    const failure = new PermanentFailure(first, "fetch", "boom");

    expect(classifyFetchFailure(failure, second)).toBe(failure);
  });

  it("wraps exhausted list retries with the attempt count and the last error", () => {
    const last = new Error("listing unavailable");
    const error = wrapListFailure(new RetryExhaustedError(2, last), "daily");

    expect(error).toBeInstanceOf(CycleAbortedError);
    expect(error.kind).toBe("list");
    expect(error.code).toBe("cycle_list_failed");
    expect(error.message).toBe("Listing slots failed for pipeline=daily: Gave up after 2 attempt(s): listing unavailable");
    expect(error.context).toEqual({ pipelineId: "daily", operation: "list", attempts: 2 });
    expect(error.cause).toBe(last);
  });

  it("wraps non-Error list failures without attempts", () => {
    const error = wrapListFailure("boom", "daily");

    expect(error.message).toBe("Listing slots failed for pipeline=daily: boom");
    expect(error.context).toEqual({ pipelineId: "daily", operation: "list" });
  });

  it("wraps a unit failure with its slot and operation", () => {
    const last = new Error("transient failure");
    const failure = new PermanentFailure(second, "fetch", new RetryExhaustedError(3, last));

    const error = wrapUnitFailure(failure, "daily");

    expect(error.kind).toBe("fetch");
    expect(error.code).toBe("cycle_fetch_failed");
    expect(error.message).toBe(
      "Cycle aborted for pipeline=daily: Slot /files/b.txt failed during fetch: Gave up after 3 attempt(s): transient failure"
    );
    expect(error.context).toEqual({ pipelineId: "daily", operation: "fetch", slot: "/files/b.txt", attempts: 3 });
    expect(error.cause).toBe(last);
  });

  it("wraps commit failures with the step that failed", () => {
    const deliver = wrapCommitFailure(new Error("disk full"), { pipelineId: "daily", operation: "deliver", slot: first });
    const checkpoint = wrapCommitFailure(new Error("store offline"), { pipelineId: "daily", operation: "checkpoint" });

    expect(deliver.code).toBe("cycle_commit_failed");
    expect(deliver.message).toBe("Commit failed during deliver for pipeline=daily: disk full");
    expect(deliver.context).toEqual({ pipelineId: "daily", operation: "deliver", slot: "/files/a.txt" });
    expect(checkpoint.context).toEqual({ pipelineId: "daily", operation: "checkpoint" });
  });

  it("describes a cancelled cycle", () => {
    const error = cancelledCycle("daily");

    expect(error.kind).toBe("cancelled");
    expect(error.message).toBe("Cycle cancelled for pipeline=daily before commit");
    expect(error.context).toEqual({ pipelineId: "daily" });
  });

  it("tracks cycle summary totals", () => {
    const tracker = createCycleSummaryTracker();

    tracker.setListed(5);
    tracker.setEligible(2);
    tracker.addFetched({ bytesRead: 100, recordsRead: 5 });
    tracker.addFetched({ bytesRead: 40, recordsRead: 2 });

    expect(tracker.summary()).toEqual({
      slotsListed: 5,
      slotsEligible: 2,
      slotsFetched: 2,
      bytesRead: 140,
      recordsRead: 7
    });
  });
});
