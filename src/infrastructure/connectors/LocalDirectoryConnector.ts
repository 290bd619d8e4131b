import { open, readdir, stat } from "fs/promises";
import path from "path";
import type { Slot, SlotContent } from "../../core/slots/slot.types";
import { ConnectorError, type ConnectorParams, type SlotConnector } from "../../ports/SlotConnector";

export type LocalDirectoryConnectorParams = {
  directory: string;
  suffix?: string;
};

const errorCode = (err: unknown): string | undefined => {
  if (typeof err !== "object" || err == null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
};

// Not retried: the file system answer will not change between attempts.
const permanentCodes = new Set(["ENOENT", "ENOTDIR", "EACCES", "EISDIR"]);

export const parseLocalDirectoryParams = (params: ConnectorParams): LocalDirectoryConnectorParams => {
  const directory = params.directory?.trim();
  if (!directory) {
    throw new Error("local connector requires a 'directory' parameter");
  }
  const suffix = params.suffix?.trim();
  return suffix ? { directory, suffix } : { directory };
};

/**
 * Treats every regular file below a directory as a slot: the identifier is its
 * relative POSIX path and the timestamp its modification time.
 */
export class LocalDirectoryConnector implements SlotConnector {
  private readonly root: string;

  constructor(private readonly params: LocalDirectoryConnectorParams) {
    this.root = path.resolve(params.directory);
  }

  async list(): Promise<Slot[]> {
    try {
      const slots: Slot[] = [];
      await this.walk(this.root, slots);
      return slots.sort((a, b) => {
        const byTime = a.timestamp.getTime() - b.timestamp.getTime();
        if (byTime !== 0) return byTime;
        if (a.identifier === b.identifier) return 0;
        return a.identifier < b.identifier ? -1 : 1;
      });
    } catch (err) {
      const code = errorCode(err);
      throw new ConnectorError({
        operation: "list",
        message: `Listing ${this.root} failed: ${code ?? (err instanceof Error ? err.message : String(err))}`,
        retryable: code == null || !permanentCodes.has(code),
        cause: err
      });
    }
  }

  async fetch(slot: Slot): Promise<SlotContent> {
    const file = path.resolve(this.root, slot.identifier);
    const relative = path.relative(this.root, file);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ConnectorError({
        operation: "fetch",
        message: `Slot ${slot.identifier} resolves outside ${this.root}`,
        retryable: false
      });
    }

    try {
      const handle = await open(file, "r");
      return handle.createReadStream();
    } catch (err) {
      const code = errorCode(err);
      throw new ConnectorError({
        operation: "fetch",
        message: `Opening ${slot.identifier} failed: ${code ?? (err instanceof Error ? err.message : String(err))}`,
        retryable: code == null || !permanentCodes.has(code),
        cause: err
      });
    }
  }

  private async walk(dir: string, into: Slot[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(full, into);
        continue;
      }
      if (!entry.isFile()) continue;
      if (this.params.suffix && !entry.name.endsWith(this.params.suffix)) continue;

      const info = await stat(full);
      into.push({
        identifier: path.relative(this.root, full).split(path.sep).join("/"),
        timestamp: info.mtime
      });
    }
  }
}
