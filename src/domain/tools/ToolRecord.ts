import type { JsonValue } from "../../ports/sys/AuditLogPort";
import { FLOW_STREAM_PREFIX } from "../audit/entries";

/** Tool names double as identifiers in the tool's source and as file names. */
export const TOOL_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Identifier-shaped and clear of the prefix that flow audit streams use. */
export function isToolName(name: string): boolean {
  return TOOL_NAME_PATTERN.test(name) && !name.startsWith(FLOW_STREAM_PREFIX);
}

export const ANNOTATION_TYPES = ["int", "float", "bool", "str", "json", "any"] as const;

export type AnnotationType = (typeof ANNOTATION_TYPES)[number];

export type ParameterKind =
  | "positional-or-keyword"
  | "keyword-only"
  | "var-positional"
  | "var-keyword";

export interface ParameterAnnotation {
  type: AnnotationType;
  /** Type text as written in the source, null when unannotated. */
  raw: string | null;
}

export interface ParameterDescriptor {
  name: string;
  kind: ParameterKind;
  required: boolean;
  default: JsonValue;
  annotation: ParameterAnnotation;
}

/**
 * How the callable's arguments line up with named params. A `keywords` slot is
 * one destructured object argument collecting keyword-only members.
 */
export type ArgumentSlot =
  | { kind: "positional"; name: string; required: boolean }
  | { kind: "rest"; name: string }
  | { kind: "keywords"; names: string[]; required: string[]; restName: string | null };

export interface ToolSignature {
  parameters: ParameterDescriptor[];
  slots: ArgumentSlot[];
  docstring: string | null;
  returnAnnotation: string | null;
}

export type ToolCallable = (...args: unknown[]) => unknown;

export interface ToolRecord {
  readonly name: string;
  readonly sourcePath: string;
  readonly sourceModifiedAt: number;
  readonly signature: ToolSignature;
  readonly docstring: string | null;
  readonly returnAnnotation: string | null;
  readonly callable: ToolCallable;
  readonly loadedAt: number;
}

export interface ToolDescription {
  name: string;
  docstring: string | null;
  parameters: ParameterDescriptor[];
  returnAnnotation: string | null;
}

/** Freezes `value` and every object or array reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) deepFreeze(Reflect.get(value, key));
  }
  return value;
}

export function describeRecord(record: ToolRecord): ToolDescription {
  return {
    name: record.name,
    docstring: record.docstring,
    parameters: record.signature.parameters.map((param) => ({
      ...param,
      annotation: { ...param.annotation },
    })),
    returnAnnotation: record.returnAnnotation,
  };
}
