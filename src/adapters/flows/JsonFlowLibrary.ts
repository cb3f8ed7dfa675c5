import type { DocumentStorePort } from "../../ports/sys/DocumentStorePort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { FlowLibraryPort } from "../../ports/flows/FlowLibraryPort";
import {
  FLOW_NAME_PATTERN,
  parseFlowDocument,
  toFlowDocument,
  type FlowSpec,
} from "../../domain/flows/FlowSpec";
import { describeError } from "../../shared/errors";

/** Flow specs stored as pretty-printed JSON documents, `<name>.json`. */
export class JsonFlowLibrary implements FlowLibraryPort {
  private readonly order: string[] = [];

  constructor(private readonly store: DocumentStorePort, private readonly logger: LoggerPort) {}

  load(): string[] {
    for (const name of this.store.keys()) {
      if (!this.order.includes(name)) this.order.push(name);
    }
    this.logger.info("Loaded flows", { count: this.order.length });
    return this.list();
  }

  save(spec: FlowSpec): void {
    this.store.write(spec.name, `${JSON.stringify(toFlowDocument(spec), null, 2)}\n`);
    if (!this.order.includes(spec.name)) this.order.push(spec.name);
  }

  get(name: string): FlowSpec | null {
    if (!FLOW_NAME_PATTERN.test(name)) return null;
    const raw = this.store.read(name);
    if (raw === null) return null;
    try {
      return parseFlowDocument(JSON.parse(raw));
    } catch (err) {
      this.logger.warn("Stored flow document is unreadable", {
        name,
        error: describeError(err).message,
      });
      return null;
    }
  }

  list(): string[] {
    const present = new Set(this.store.keys());
    const known = this.order.filter((name) => present.has(name));
    // documents written by another process since load
    const added = Array.from(present).filter((name) => !this.order.includes(name));
    return [...known, ...added];
  }

  remove(name: string): boolean {
    if (!FLOW_NAME_PATTERN.test(name)) return false;
    const index = this.order.indexOf(name);
    if (index >= 0) this.order.splice(index, 1);
    return this.store.remove(name);
  }
}
