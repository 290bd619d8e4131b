import type { Slot } from "../slots/slot.types";

export type CursorCheckpoint = {
  watermark: string; // ISO-8601
  excludedAtWatermark: string[];
};

export class InvalidCheckpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCheckpointError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const assertValidDate = (name: string, value: Date) => {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new InvalidCheckpointError(`${name} must be a valid date`);
  }
};

/**
 * Immutable "consumed up to here" marker.
 *
 * Everything strictly before `watermark` is consumed, and so is every slot at
 * exactly `watermark` whose identifier is in `excludedAtWatermark`.
 */
export class RangeCursor {
  private constructor(
    readonly watermark: Date,
    readonly excludedAtWatermark: ReadonlySet<string>
  ) {}

  static from(watermark: Date, excluded: Iterable<string> = []): RangeCursor {
    assertValidDate("watermark", watermark);
    return new RangeCursor(new Date(watermark.getTime()), new Set(excluded));
  }

  static fromCheckpoint(checkpoint: unknown): RangeCursor {
    if (typeof checkpoint !== "object" || checkpoint == null) {
      throw new InvalidCheckpointError("Checkpoint must be an object");
    }
    if (!("watermark" in checkpoint) || !("excludedAtWatermark" in checkpoint)) {
      throw new InvalidCheckpointError("Checkpoint must have watermark and excludedAtWatermark");
    }

    const { watermark, excludedAtWatermark } = checkpoint;
    if (typeof watermark !== "string") {
      throw new InvalidCheckpointError("Checkpoint watermark must be an ISO-8601 string");
    }
    if (!Array.isArray(excludedAtWatermark) || !excludedAtWatermark.every((id) => typeof id === "string")) {
      throw new InvalidCheckpointError("Checkpoint excludedAtWatermark must be an array of strings");
    }

    const date = new Date(watermark);
    if (Number.isNaN(date.getTime())) {
      throw new InvalidCheckpointError(`Checkpoint watermark is not a valid date: ${watermark}`);
    }

    return new RangeCursor(date, new Set<string>(excludedAtWatermark));
  }

  isEligible(slot: Slot): boolean {
    const ts = slot.timestamp.getTime();
    const mark = this.watermark.getTime();
    if (ts > mark) return true;
    if (ts < mark) return false;
    return !this.excludedAtWatermark.has(slot.identifier);
  }

  /** Keeps listing order; ties at equal timestamps are not re-sorted. */
  filter(slots: readonly Slot[]): Slot[] {
    return slots.filter((slot) => this.isEligible(slot));
  }

  advance(processed: readonly Slot[]): RangeCursor {
    if (processed.length === 0) return this;

    let maxTs = this.watermark.getTime();
    for (const slot of processed) {
      maxTs = Math.max(maxTs, slot.timestamp.getTime());
    }

    const atWatermark = processed
      .filter((slot) => slot.timestamp.getTime() === maxTs)
      .map((slot) => slot.identifier);

    // Watermark did not move: previously excluded identifiers still hold.
    const excluded =
      maxTs === this.watermark.getTime()
        ? [...this.excludedAtWatermark, ...atWatermark]
        : atWatermark;

    return new RangeCursor(new Date(maxTs), new Set(excluded));
  }

  equals(other: RangeCursor): boolean {
    if (this.watermark.getTime() !== other.watermark.getTime()) return false;
    if (this.excludedAtWatermark.size !== other.excludedAtWatermark.size) return false;
    for (const id of this.excludedAtWatermark) {
      if (!other.excludedAtWatermark.has(id)) return false;
    }
    return true;
  }

  toCheckpoint(): CursorCheckpoint {
    return {
      watermark: this.watermark.toISOString(),
      excludedAtWatermark: [...this.excludedAtWatermark].sort()
    };
  }
}
