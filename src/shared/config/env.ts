import { isConnectorKind, type ConnectorKind, type ConnectorParams } from "../../ports/SlotConnector";

export type Env = {
  MONGO_URI: string;
  INGEST_PIPELINE_ID: string;
  INGEST_CONNECTOR: ConnectorKind;
  INGEST_CONNECTOR_PARAMS: ConnectorParams;
  INGEST_START_DATE: Date;
  INGEST_EXCLUDED_SLOTS: string[];
  INGEST_OUTPUT?: string;   // file to append lines to, stdout when unset
};

const parseConnectorParams = (raw: string | undefined): ConnectorParams => {
  if (raw == null || raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("INGEST_CONNECTOR_PARAMS must be a JSON object of strings");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("INGEST_CONNECTOR_PARAMS must be a JSON object of strings");
  }

  const params: ConnectorParams = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`INGEST_CONNECTOR_PARAMS.${key} must be a string`);
    }
    params[key] = value;
  }
  return params;
};

const parseStartDate = (raw: string | undefined): Date => {
  if (raw == null || raw.trim() === "") return new Date(0);
  const date = new Date(raw.trim());
  if (Number.isNaN(date.getTime())) {
    throw new Error(`INGEST_START_DATE must be an ISO-8601 date. Received: ${raw}`);
  }
  return date;
};

const parseList = (raw: string | undefined): string[] =>
  (raw ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/slot-ingest";
  const INGEST_PIPELINE_ID = env.INGEST_PIPELINE_ID?.trim() || "default";

  const connector = env.INGEST_CONNECTOR?.trim() || "local";
  if (!isConnectorKind(connector)) {
    throw new Error(`INGEST_CONNECTOR must be one of local, http. Received: ${connector}`);
  }

  const output = env.INGEST_OUTPUT?.trim();

  return {
    ...(output ? { INGEST_OUTPUT: output } : {}),
    MONGO_URI,
    INGEST_PIPELINE_ID,
    INGEST_CONNECTOR: connector,
    INGEST_CONNECTOR_PARAMS: parseConnectorParams(env.INGEST_CONNECTOR_PARAMS),
    INGEST_START_DATE: parseStartDate(env.INGEST_START_DATE),
    INGEST_EXCLUDED_SLOTS: parseList(env.INGEST_EXCLUDED_SLOTS)
  };
};
