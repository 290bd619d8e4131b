import { InvalidCheckpointError, RangeCursor } from "../../src/core/cursor/RangeCursor";
import { day, slot } from "../support/slotFakes";

describe("RangeCursor", () => {
  it("treats later slots as eligible and earlier slots as consumed", () => {
    const cursor = RangeCursor.from(day("2016-12-01"));

    expect(cursor.isEligible(slot("/files/a.txt", "2016-12-02"))).toBe(true);
    expect(cursor.isEligible(slot("/files/b.txt", "2016-11-30"))).toBe(false);
  });

  it("uses the exclusion set only for slots at exactly the watermark", () => {
    const cursor = RangeCursor.from(day("2016-12-01"), ["/files/example_20161201_1.txt"]);

    expect(cursor.isEligible(slot("/files/example_20161201_1.txt", "2016-12-01"))).toBe(false);
    expect(cursor.isEligible(slot("/files/example_20161201_2.txt", "2016-12-01"))).toBe(true);
    expect(cursor.isEligible(slot("/files/example_20161201_1.txt", "2016-12-02"))).toBe(true);
  });

  it("filters same-date slots down to the one not yet excluded", () => {
    const cursor = RangeCursor.from(day("2016-12-01"), ["/files/example_20161201_1.txt"]);
    const eligible = cursor.filter([
      slot("/files/example_20161201_1.txt", "2016-12-01"),
      slot("/files/example_20161201_2.txt", "2016-12-01")
    ]);

    expect(eligible.map((s) => s.identifier)).toEqual(["/files/example_20161201_2.txt"]);
  });

  it("keeps listing order when filtering, without sorting by timestamp", () => {
    const cursor = RangeCursor.from(day("2016-01-01"));
    const eligible = cursor.filter([
      slot("c", "2016-12-03"),
      slot("old", "2015-12-31"),
      slot("a", "2016-12-01"),
      slot("b", "2016-12-01")
    ]);

    expect(eligible.map((s) => s.identifier)).toEqual(["c", "a", "b"]);
  });

  it("advances to the newest processed timestamp and excludes the slots at it", () => {
    const cursor = RangeCursor.from(day("2016-01-01")).advance([
      slot("/files/example_20161201.txt", "2016-12-01"),
      slot("/files/example_20161202.txt", "2016-12-02")
    ]);

    expect(cursor.toCheckpoint()).toEqual({
      watermark: "2016-12-02T00:00:00.000Z",
      excludedAtWatermark: ["/files/example_20161202.txt"]
    });
  });

  it("excludes every identifier sharing the new watermark", () => {
    const cursor = RangeCursor.from(day("2016-01-01")).advance([
      slot("x_2", "2016-12-01"),
      slot("x_1", "2016-12-01")
    ]);

    expect(cursor.toCheckpoint()).toEqual({
      watermark: "2016-12-01T00:00:00.000Z",
      excludedAtWatermark: ["x_1", "x_2"]
    });
  });

  it("returns the same cursor for an empty batch", () => {
    const cursor = RangeCursor.from(day("2016-12-01"), ["a"]);
    expect(cursor.advance([])).toBe(cursor);
  });

  it("keeps earlier exclusions while the watermark does not move", () => {
    const cursor = RangeCursor.from(day("2016-12-01"), ["a"]).advance([slot("b", "2016-12-01")]);

    expect(cursor.toCheckpoint().excludedAtWatermark).toEqual(["a", "b"]);
    expect(cursor.isEligible(slot("a", "2016-12-01"))).toBe(false);
    expect(cursor.isEligible(slot("b", "2016-12-01"))).toBe(false);
    expect(cursor.isEligible(slot("c", "2016-12-01"))).toBe(true);
  });

  it("drops earlier exclusions once the watermark moves on", () => {
    const cursor = RangeCursor.from(day("2016-12-01"), ["a"]).advance([slot("b", "2016-12-02")]);

    expect(cursor.toCheckpoint()).toEqual({
      watermark: "2016-12-02T00:00:00.000Z",
      excludedAtWatermark: ["b"]
    });
  });

  it("never moves the watermark backwards over a sequence of batches", () => {
    const batches = [
      [slot("a", "2016-12-03"), slot("b", "2016-12-01")],
      [],
      [slot("c", "2016-12-03")],
      [slot("d", "2016-12-05"), slot("e", "2016-12-04")]
    ];

    let cursor = RangeCursor.from(day("2016-12-01"));
    const watermarks: string[] = [];
    for (const batch of batches) {
      cursor = cursor.advance(cursor.filter(batch));
      watermarks.push(cursor.watermark.toISOString().slice(0, 10));
    }

    expect(watermarks).toEqual(["2016-12-03", "2016-12-03", "2016-12-03", "2016-12-05"]);
  });

  it("does not let callers mutate the watermark it was built from", () => {
    const source = day("2016-12-01");
    const cursor = RangeCursor.from(source);
    source.setUTCFullYear(2030);

    expect(cursor.watermark.toISOString()).toBe("2016-12-01T00:00:00.000Z");
  });

  it("round-trips through its checkpoint form", () => {
    const cursor = RangeCursor.from(day("2016-12-01"), ["b", "a"]);
    const restored = RangeCursor.fromCheckpoint(JSON.parse(JSON.stringify(cursor.toCheckpoint())));

    expect(restored.equals(cursor)).toBe(true);
    expect(restored.toCheckpoint()).toEqual({
      watermark: "2016-12-01T00:00:00.000Z",
      excludedAtWatermark: ["a", "b"]
    });
  });

  it.each([
    [null, "Checkpoint must be an object"],
    [{ watermark: "2016-12-01T00:00:00.000Z" }, "Checkpoint must have watermark and excludedAtWatermark"],
    [{ watermark: 5, excludedAtWatermark: [] }, "Checkpoint watermark must be an ISO-8601 string"],
    [{ watermark: "yesterday", excludedAtWatermark: [] }, "Checkpoint watermark is not a valid date: yesterday"],
    [
      { watermark: "2016-12-01T00:00:00.000Z", excludedAtWatermark: [1] },
      "Checkpoint excludedAtWatermark must be an array of strings"
    ]
  ])("rejects malformed checkpoint %j", (checkpoint, message) => {
    expect(() => RangeCursor.fromCheckpoint(checkpoint)).toThrow(InvalidCheckpointError);
    expect(() => RangeCursor.fromCheckpoint(checkpoint)).toThrow(message);
  });

  it("rejects an invalid initial watermark", () => {
    expect(() => RangeCursor.from(new Date("not a date"))).toThrow("watermark must be a valid date");
  });

  it("compares cursors by watermark and exclusions", () => {
    const base = RangeCursor.from(day("2016-12-01"), ["a"]);

    expect(base.equals(RangeCursor.from(day("2016-12-01"), ["a"]))).toBe(true);
    expect(base.equals(RangeCursor.from(day("2016-12-01"), ["b"]))).toBe(false);
    expect(base.equals(RangeCursor.from(day("2016-12-02"), ["a"]))).toBe(false);
  });
});
