import type { ConnectorKind, ConnectorParams, SlotConnector } from "../../ports/SlotConnector";
import { HttpSlotConnector, parseHttpSlotParams } from "./HttpSlotConnector";
import { LocalDirectoryConnector, parseLocalDirectoryParams } from "./LocalDirectoryConnector";

/** Builds a connector from its kind and the opaque parameters it was configured with. */
export const createConnector = (kind: ConnectorKind, params: ConnectorParams): SlotConnector => {
  switch (kind) {
    case "local":
      return new LocalDirectoryConnector(parseLocalDirectoryParams(params));
    case "http":
      return new HttpSlotConnector(parseHttpSlotParams(params));
  }
};
