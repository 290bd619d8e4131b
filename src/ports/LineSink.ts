import type { Slot } from "../core/slots/slot.types";

/** Downstream consumer; called once per slot, in delivery order. */
export interface LineSink {
  write(slot: Slot, lines: readonly string[]): Promise<void>;
}
