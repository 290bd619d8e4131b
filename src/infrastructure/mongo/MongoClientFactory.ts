import { MongoClient } from "mongodb";

export type MongoConnectOptions = {
  appName?: string;
  serverSelectionTimeoutMs?: number;
};

export const createMongoClient = async (mongoUri: string, opts: MongoConnectOptions = {}): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, {
    appName: opts.appName ?? "slot-ingest",
    serverSelectionTimeoutMS: opts.serverSelectionTimeoutMs ?? 10000
  });
  try {
    await client.connect();
  } catch (err) {
    await client.close();
    throw err;
  }
  return client;
};
