import type { Slot, SlotContent } from "../core/slots/slot.types";

export type ConnectorParams = Record<string, string>;

export const connectorKinds = ["local", "http"] as const;
export type ConnectorKind = (typeof connectorKinds)[number];

export const isConnectorKind = (value: string): value is ConnectorKind =>
  connectorKinds.some((kind) => kind === value);

/**
 * Read-only view over a remote store of dated slots.
 * Both operations may be called repeatedly for the same slot (retries, failed
 * cycles) and must not change anything remotely.
 */
export interface SlotConnector {
  list(signal?: AbortSignal): Promise<Slot[]>;
  fetch(slot: Slot, signal?: AbortSignal): Promise<SlotContent>;
}

export type ConnectorOperation = "list" | "fetch";

/**
 * Failure of a single list or fetch call. Retried by the pipeline unless
 * `retryable` is false.
 */
export class ConnectorError extends Error {
  readonly operation: ConnectorOperation;
  readonly retryable: boolean;
  readonly status?: number;
  readonly cause?: unknown;

  constructor(args: {
    operation: ConnectorOperation;
    message: string;
    retryable?: boolean;
    status?: number;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "ConnectorError";
    this.operation = args.operation;
    this.retryable = args.retryable ?? true;
    this.status = args.status;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
