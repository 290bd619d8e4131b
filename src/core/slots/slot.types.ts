export type Slot = {
  identifier: string;   // path or name, unique within one listing
  timestamp: Date;      // logical date of the slot, may be shared
};

export type SlotContent = Uint8Array | AsyncIterable<Uint8Array>;

export type FetchResult = {
  slot: Slot;
  lines: readonly string[];
  bytesRead: number;
  recordsRead: number;
};
