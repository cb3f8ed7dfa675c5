import fs from "fs";
import path from "path";
import type { AuditLogPort, JsonObject } from "../../ports/sys/AuditLogPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

/** One `<streamId>.jsonl` file per stream, one JSON record per line. */
export class JsonlAuditLog implements AuditLogPort {
  readonly dir: string;

  constructor(dir: string, private readonly logger: LoggerPort) {
    this.dir = path.resolve(dir);
    fs.mkdirSync(this.dir, { recursive: true });
  }

  fileFor(streamId: string): string {
    return path.join(this.dir, `${streamId.replace(/[\\/]/g, "_")}.jsonl`);
  }

  append(streamId: string, entry: JsonObject): void {
    const line = `${JSON.stringify(entry)}\n`;
    const fd = fs.openSync(this.fileFor(streamId), "a");
    try {
      // single write per record; a crash can only tear the record in flight
      fs.writeSync(fd, line);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  tail(streamId: string, limit?: number): unknown[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.fileFor(streamId), "utf8");
    } catch (err) {
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
        return [];
      }
      throw err;
    }

    const entries: unknown[] = [];
    for (const line of raw.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      try {
        entries.push(JSON.parse(trimmed));
      } catch {
        this.logger.warn("Skipping malformed audit entry", { stream: streamId });
      }
    }

    const recent = limit === undefined ? entries : entries.slice(-limit);
    return recent.reverse();
  }
}
