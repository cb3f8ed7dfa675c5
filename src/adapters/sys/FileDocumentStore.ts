import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import type { DocumentStorePort } from "../../ports/sys/DocumentStorePort";
import { ValidationError } from "../../shared/errors";

/**
 * One file per document, `<dir>/<key><extension>`. Writes go to a temporary
 * sibling first and are renamed into place.
 */
export class FileDocumentStore implements DocumentStorePort {
  readonly dir: string;

  constructor(dir: string, private readonly extension: string) {
    this.dir = path.resolve(dir);
    fs.mkdirSync(this.dir, { recursive: true });
  }

  /** Keys name files directly inside `dir`; anything resolving elsewhere is rejected. */
  locate(key: string): string {
    const target = path.resolve(this.dir, `${key}${this.extension}`);
    if (!key || path.dirname(target) !== this.dir) {
      throw new ValidationError(`Document key "${key}" does not name a file in ${this.dir}.`, "key");
    }
    return target;
  }

  write(key: string, content: string): void {
    const target = this.locate(key);
    const temp = path.join(this.dir, `.${key}.${randomUUID()}.tmp`);
    const fd = fs.openSync(temp, "w");
    try {
      fs.writeSync(fd, content);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    try {
      fs.renameSync(temp, target);
    } catch (err) {
      fs.rmSync(temp, { force: true });
      throw err;
    }
  }

  read(key: string): string | null {
    try {
      return fs.readFileSync(this.locate(key), "utf8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  remove(key: string): boolean {
    try {
      fs.unlinkSync(this.locate(key));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  exists(key: string): boolean {
    return this.modifiedAt(key) !== null;
  }

  keys(): string[] {
    return fs
      .readdirSync(this.dir)
      .filter((file) => file.endsWith(this.extension) && !file.startsWith("."))
      .map((file) => file.slice(0, -this.extension.length))
      .sort();
  }

  modifiedAt(key: string): number | null {
    try {
      return fs.statSync(this.locate(key)).mtimeMs;
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }
}

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
