import { randomUUID } from "crypto";
import type { AuditLogPort } from "../../ports/sys/AuditLogPort";
import type { DocumentStorePort } from "../../ports/sys/DocumentStorePort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { CompiledTool, ToolLoaderPort } from "../../ports/tools/ToolLoaderPort";
import type {
  InvokeOptions,
  RegisterOptions,
  ToolRegistryPort,
} from "../../ports/tools/ToolRegistryPort";
import {
  deepFreeze,
  describeRecord,
  isToolName,
  TOOL_NAME_PATTERN,
  type ToolDescription,
  type ToolRecord,
} from "../../domain/tools/ToolRecord";
import { bindArguments } from "../../domain/tools/bindArguments";
import {
  FLOW_STREAM_PREFIX,
  flowStreamId,
  normalizeLimit,
  readToolRuns,
  summarizeResult,
  toJsonSafeRecord,
  toolStreamId,
  type FlowRunEntry,
  type RunStatus,
  type ToolRunEntry,
} from "../../domain/audit/entries";
import {
  describeError,
  ExecutionError,
  NotFoundError,
  ValidationError,
  type ErrorInfo,
} from "../../shared/errors";

export interface SourceToolRegistryOptions {
  store: DocumentStorePort;
  loader: ToolLoaderPort;
  audit: AuditLogPort;
  logger: LoggerPort;
  now?: () => number;
  newRunId?: () => string;
}

export type CatalogEntry = ToolDescription;

/**
 * Tools kept as source documents and served as cached, reflected callables.
 * A record is rebuilt whenever its source file's mtime moves past the one it
 * was built from.
 */
export class SourceToolRegistry implements ToolRegistryPort {
  private readonly records = new Map<string, ToolRecord>();
  private readonly store: DocumentStorePort;
  private readonly loader: ToolLoaderPort;
  private readonly audit: AuditLogPort;
  private readonly logger: LoggerPort;
  private readonly now: () => number;
  private readonly newRunId: () => string;

  constructor(options: SourceToolRegistryOptions) {
    this.store = options.store;
    this.loader = options.loader;
    this.audit = options.audit;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.newRunId = options.newRunId ?? (() => randomUUID().replace(/-/g, ""));
  }

  /** Loads every stored tool; sources that fail to load are logged and skipped. */
  load(): string[] {
    for (const name of this.store.keys()) {
      if (!isToolName(name)) {
        this.logger.warn("Ignoring tool file with an invalid name", { name });
        continue;
      }
      try {
        this.rebuild(name);
      } catch (err) {
        this.logger.warn("Could not load tool", { name, error: describeError(err).message });
      }
    }
    this.logger.info("Loaded tools", { count: this.records.size });
    return this.list();
  }

  register(name: string, source: string, options: RegisterOptions = {}): ToolRecord {
    if (!TOOL_NAME_PATTERN.test(name)) {
      throw new ValidationError(
        `Invalid tool name "${name}"; use letters, digits and underscores, not starting with a digit.`,
        "name"
      );
    }
    if (!isToolName(name)) {
      throw new ValidationError(
        `Invalid tool name "${name}"; names starting with "${FLOW_STREAM_PREFIX}" are reserved for flow logs.`,
        "name"
      );
    }
    const exists = this.records.has(name) || this.store.exists(name);
    if (exists && !options.overwrite) {
      throw new ValidationError(`Tool "${name}" already exists; pass overwrite to replace it.`, "name");
    }

    const sourcePath = this.store.locate(name);
    const compiled = this.loader.compile(name, source, sourcePath);
    this.store.write(name, source);
    const record = this.install(name, compiled, this.store.modifiedAt(name) ?? this.now());
    this.logger.info(exists ? "Replaced tool" : "Registered tool", { name });
    return record;
  }

  get(name: string): ToolRecord {
    this.assertKnownName(name);
    const modifiedAt = this.store.modifiedAt(name);
    const record = this.records.get(name);
    if (modifiedAt === null) {
      if (record) {
        this.records.delete(name);
        this.logger.warn("Tool source disappeared; evicting cached record", { name });
      }
      throw new NotFoundError("tool", name);
    }
    if (record && modifiedAt <= record.sourceModifiedAt) return record;

    this.logger.debug(record ? "Reloading stale tool" : "Loading tool from disk", { name });
    return this.rebuild(name);
  }

  has(name: string): boolean {
    try {
      this.get(name);
      return true;
    } catch (err) {
      if (err instanceof NotFoundError) return false;
      throw err;
    }
  }

  async invoke(
    name: string,
    params: Record<string, unknown> = {},
    options: InvokeOptions = {}
  ): Promise<unknown> {
    const record = this.get(name);
    const runId = this.newRunId();
    const startedAt = this.now();
    let status: RunStatus = "success";
    let error: ErrorInfo | null = null;
    let result: unknown = undefined;

    try {
      const args = bindArguments(name, record.signature.slots, params);
      result = await record.callable(...args);
      return result;
    } catch (err) {
      status = "error";
      error = describeError(err);
      throw new ExecutionError(name, error);
    } finally {
      this.recordRun(name, runId, startedAt, params, status, error, result, options);
    }
  }

  describe(name: string): ToolDescription {
    return describeRecord(this.get(name));
  }

  /** Reads the file itself, never the cache. */
  getSource(name: string): string {
    this.assertKnownName(name);
    const source = this.store.read(name);
    if (source === null) throw new NotFoundError("tool", name);
    return source;
  }

  list(): string[] {
    return Array.from(this.records.keys());
  }

  remove(name: string): void {
    this.assertKnownName(name);
    const removedFile = this.store.remove(name);
    const removedRecord = this.records.delete(name);
    if (!removedFile && !removedRecord) throw new NotFoundError("tool", name);
    this.logger.info("Removed tool", { name });
  }

  catalog(): CatalogEntry[] {
    const entries: CatalogEntry[] = [];
    for (const name of this.list()) {
      try {
        entries.push(this.describe(name));
      } catch (err) {
        this.logger.warn("Skipping tool while building catalog", {
          name,
          error: describeError(err).message,
        });
      }
    }
    return entries;
  }

  getRuns(name: string, limit?: number): ToolRunEntry[] {
    this.get(name);
    return readToolRuns(this.audit, name, normalizeLimit(limit));
  }

  /** A name no tool could be registered under never reaches the store. */
  private assertKnownName(name: string): void {
    if (!isToolName(name)) throw new NotFoundError("tool", name);
  }

  private rebuild(name: string): ToolRecord {
    // stat before reading so a concurrent edit shows up as stale next time
    const modifiedAt = this.store.modifiedAt(name);
    const source = this.store.read(name);
    if (modifiedAt === null || source === null) throw new NotFoundError("tool", name);
    return this.install(name, this.loader.compile(name, source, this.store.locate(name)), modifiedAt);
  }

  private install(name: string, compiled: CompiledTool, modifiedAt: number): ToolRecord {
    const record: ToolRecord = Object.freeze({
      name,
      sourcePath: this.store.locate(name),
      sourceModifiedAt: modifiedAt,
      signature: deepFreeze(compiled.signature),
      docstring: compiled.signature.docstring,
      returnAnnotation: compiled.signature.returnAnnotation,
      callable: compiled.callable,
      loadedAt: this.now(),
    });
    this.records.set(name, record);
    return record;
  }

  private recordRun(
    name: string,
    runId: string,
    startedAt: number,
    params: Record<string, unknown>,
    status: RunStatus,
    error: ErrorInfo | null,
    result: unknown,
    options: InvokeOptions
  ): void {
    const finishedAt = this.now();
    const common = {
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
      params: toJsonSafeRecord(params),
      status,
      error,
      resultSummary: status === "success" ? summarizeResult(result) : null,
    };

    const toolEntry: ToolRunEntry = { runId, toolName: name, ...common };
    this.audit.append(toolStreamId(name), toolEntry);

    if (options.flow) {
      const { flowName, flowRunId, stepId } = options.flow;
      const flowEntry: FlowRunEntry = { flowRunId, flowName, stepId, tool: name, ...common };
      this.audit.append(flowStreamId(flowName), flowEntry);
    }
  }
}
