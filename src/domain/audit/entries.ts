import { inspect, types } from "util";
import { z } from "zod";
import type { AuditLogPort, JsonValue } from "../../ports/sys/AuditLogPort";
import { ValidationError } from "../../shared/errors";

const MAX_SUMMARY_LENGTH = 200;

export const FLOW_STREAM_PREFIX = "flow_";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const errorInfoSchema = z.object({ type: z.string(), message: z.string() });

const runStatusSchema = z.enum(["success", "error"]);

export const toolRunEntrySchema = z.object({
  runId: z.string(),
  toolName: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
  params: z.record(jsonValueSchema),
  status: runStatusSchema,
  error: errorInfoSchema.nullable(),
  resultSummary: z.string().nullable(),
});

export const flowRunEntrySchema = z.object({
  flowRunId: z.string(),
  flowName: z.string(),
  stepId: z.string().nullable(),
  tool: z.string().nullable(),
  params: z.record(jsonValueSchema),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
  status: runStatusSchema,
  error: errorInfoSchema.nullable(),
  resultSummary: z.string().nullable(),
});

export type RunStatus = z.infer<typeof runStatusSchema>;
export type ToolRunEntry = z.infer<typeof toolRunEntrySchema>;
export type FlowRunEntry = z.infer<typeof flowRunEntrySchema>;

export function toolStreamId(toolName: string): string {
  return toolName;
}

/** Tool names may not start with `flow_`, which keeps the two kinds of stream apart. */
export function flowStreamId(flowName: string): string {
  return `${FLOW_STREAM_PREFIX}${flowName}`;
}

/** Snapshot of an arbitrary value that survives `JSON.stringify` unchanged. */
export function toJsonSafe(value: unknown, seen: Set<object> = new Set()): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return value.toString();
  if (typeof value !== "object") return inspect(value);
  if (seen.has(value)) return "[Circular]";
  seen.add(value);
  try {
    // tool results come from another vm realm, so no instanceof here
    if (types.isDate(value)) return value.toISOString();
    if (Array.isArray(value) || types.isSet(value)) {
      return Array.from(value, (item) => toJsonSafe(item, seen));
    }
    if (types.isMap(value)) {
      const out: Record<string, JsonValue> = {};
      for (const [key, item] of value) out[String(key)] = toJsonSafe(item, seen);
      return out;
    }
    const out: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) out[key] = toJsonSafe(item, seen);
    return out;
  } finally {
    seen.delete(value);
  }
}

export function toJsonSafeRecord(params: Record<string, unknown>): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(params)) out[key] = toJsonSafe(value);
  return out;
}

export function summarizeResult(result: unknown): string | null {
  if (result === undefined || result === null) return null;
  const summary = inspect(result, { depth: 2, breakLength: Infinity });
  if (summary.length > MAX_SUMMARY_LENGTH) {
    return `${summary.slice(0, MAX_SUMMARY_LENGTH - 3)}...`;
  }
  return summary;
}

export function readToolRuns(log: AuditLogPort, toolName: string, limit?: number): ToolRunEntry[] {
  return parseEntries(log.tail(toolStreamId(toolName)), toolRunEntrySchema, limit);
}

export function readFlowRuns(log: AuditLogPort, flowName: string, limit?: number): FlowRunEntry[] {
  return parseEntries(log.tail(flowStreamId(flowName)), flowRunEntrySchema, limit);
}

/** `limit` counts valid entries, so it applies after the schema filter. */
function parseEntries<T>(raw: unknown[], schema: z.ZodType<T>, limit?: number): T[] {
  const entries: T[] = [];
  for (const item of raw) {
    if (limit !== undefined && entries.length >= limit) break;
    const parsed = schema.safeParse(item);
    if (parsed.success) entries.push(parsed.data);
  }
  return entries;
}

/** Undefined means "everything"; anything else must be a positive integer. */
export function normalizeLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) return undefined;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}.`, "limit");
  }
  return limit;
}
