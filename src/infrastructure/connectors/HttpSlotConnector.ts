import type { Slot, SlotContent } from "../../core/slots/slot.types";
import {
  ConnectorError,
  type ConnectorOperation,
  type ConnectorParams,
  type SlotConnector
} from "../../ports/SlotConnector";

export type HttpSlotConnectorParams = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

const DEFAULT_TIMEOUT_MS = 8000;

export const parseHttpSlotParams = (params: ConnectorParams): HttpSlotConnectorParams => {
  const raw = params.baseUrl?.trim() ?? "";
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`http connector baseUrl must be a valid absolute http/https URL. Received: ${raw}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`http connector baseUrl must use http or https scheme. Received: ${raw}`);
  }

  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (params.timeoutMs != null && params.timeoutMs.trim() !== "") {
    timeoutMs = Number(params.timeoutMs);
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      throw new Error(`http connector timeoutMs must be an integer >= 1. Received: ${params.timeoutMs}`);
    }
  }

  const apiKey = params.apiKey?.trim();
  return apiKey ? { baseUrl: raw, apiKey, timeoutMs } : { baseUrl: raw, timeoutMs };
};

type SlotListingEntry = {
  identifier: string;
  timestamp: string;
};

const isListingEntry = (value: unknown): value is SlotListingEntry =>
  typeof value === "object" &&
  value !== null &&
  "identifier" in value &&
  "timestamp" in value &&
  typeof value.identifier === "string" &&
  typeof value.timestamp === "string";

export const parseSlotListing = (json: unknown): Slot[] => {
  if (!Array.isArray(json)) {
    throw new ConnectorError({ operation: "list", message: "Slot listing is not an array", retryable: false });
  }

  return json.map((entry, index) => {
    if (!isListingEntry(entry)) {
      throw new ConnectorError({
        operation: "list",
        message: `Slot listing entry ${index} needs string identifier and timestamp`,
        retryable: false
      });
    }
    const timestamp = new Date(entry.timestamp);
    if (Number.isNaN(timestamp.getTime())) {
      throw new ConnectorError({
        operation: "list",
        message: `Slot listing entry ${index} has an invalid timestamp`,
        retryable: false
      });
    }
    return { identifier: entry.identifier, timestamp };
  });
};

/**
 * Slots served over HTTP:
 * - GET {baseUrl}/slots            -> [{ identifier, timestamp }]
 * - GET {baseUrl}/slots/{id}       -> raw (optionally gzipped) bytes
 *
 * Does not retry on its own; non-429 4xx responses are marked non-retryable.
 */
export class HttpSlotConnector implements SlotConnector {
  constructor(private readonly params: HttpSlotConnectorParams) {}

  async list(signal?: AbortSignal): Promise<Slot[]> {
    const body = await this.request("list", this.urlFor("slots"), signal, (res) => res.text());
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new ConnectorError({ operation: "list", message: "Slot listing is not valid JSON", cause: err });
    }
    return parseSlotListing(json);
  }

  async fetch(slot: Slot, signal?: AbortSignal): Promise<SlotContent> {
    return this.request(
      "fetch",
      this.urlFor(`slots/${encodeURIComponent(slot.identifier)}`),
      signal,
      async (res) => new Uint8Array(await res.arrayBuffer())
    );
  }

  private urlFor(relativePath: string): URL {
    const url = new URL(this.params.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${relativePath}` : `${url.pathname}/${relativePath}`;
    return url;
  }

  /** The timeout covers the whole exchange, body included. */
  private async request<T>(
    operation: ConnectorOperation,
    url: URL,
    signal: AbortSignal | undefined,
    read: (res: Response) => Promise<T>
  ): Promise<T> {
    const safeRequestUrl = `${url.origin}${url.pathname}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.params.timeoutMs);
    const onStop = () => controller.abort();
    signal?.addEventListener("abort", onStop, { once: true });

    const headers: Record<string, string> = {};
    if (this.params.apiKey) headers["X-API-Key"] = this.params.apiKey;

    try {
      const res = await fetch(url.toString(), { headers, signal: controller.signal });
      if (!res.ok) {
        // Drain so the socket is released; the body itself is never surfaced.
        await res.arrayBuffer().catch(() => undefined);
        const status = res.status;
        throw new ConnectorError({
          operation,
          message: `Slot ${operation} request failed: ${status} ${safeRequestUrl}`,
          status,
          retryable: !(status >= 400 && status < 500 && status !== 429)
        });
      }
      return await read(res);
    } catch (err) {
      if (err instanceof ConnectorError) throw err;
      if (controller.signal.aborted && !signal?.aborted) {
        throw new ConnectorError({
          operation,
          message: `Slot ${operation} request timeout after ${this.params.timeoutMs}ms: ${safeRequestUrl}`,
          cause: err
        });
      }
      throw new ConnectorError({
        operation,
        message: `Slot ${operation} request failed: ${safeRequestUrl}`,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onStop);
    }
  }
}
