import type { JsonValue } from "../../ports/sys/AuditLogPort";
import { UnresolvedReferenceError } from "../../shared/errors";

const INPUTS_PREFIX = "$inputs.";
const CTX_PREFIX = "$ctx.";

export type Placeholder = { scope: "inputs" | "ctx"; key: string };

/**
 * Recognizes a placeholder only when the whole value is one; strings that merely
 * contain the pattern are literals.
 */
export function parsePlaceholder(value: JsonValue): Placeholder | null {
  if (typeof value !== "string") return null;
  if (value.startsWith(INPUTS_PREFIX) && value.length > INPUTS_PREFIX.length) {
    return { scope: "inputs", key: value.slice(INPUTS_PREFIX.length) };
  }
  if (value.startsWith(CTX_PREFIX) && value.length > CTX_PREFIX.length) {
    return { scope: "ctx", key: value.slice(CTX_PREFIX.length) };
  }
  return null;
}

export interface ResolutionScope {
  inputs: Record<string, unknown>;
  ctx: Map<string, unknown>;
}

export function resolveValue(value: JsonValue, scope: ResolutionScope): unknown {
  const placeholder = parsePlaceholder(value);
  if (!placeholder) return value;

  if (placeholder.scope === "inputs") {
    if (!Object.prototype.hasOwnProperty.call(scope.inputs, placeholder.key)) {
      throw new UnresolvedReferenceError(`${INPUTS_PREFIX}${placeholder.key}`, "inputs");
    }
    return scope.inputs[placeholder.key];
  }

  if (!scope.ctx.has(placeholder.key)) {
    throw new UnresolvedReferenceError(`${CTX_PREFIX}${placeholder.key}`, "ctx");
  }
  return scope.ctx.get(placeholder.key);
}

/** Resolves params in declaration order, stopping at the first unresolved reference. */
export function resolveParams(
  params: Record<string, JsonValue>,
  scope: ResolutionScope
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(params)) {
    resolved[name] = resolveValue(value, scope);
  }
  return resolved;
}
