import type { ToolDescription, ToolRecord } from "../../domain/tools/ToolRecord";

export interface RegisterOptions {
  /** Replace an existing tool of the same name instead of failing. */
  overwrite?: boolean;
}

/** Identifies the flow step an invocation belongs to, for the flow's audit stream. */
export interface FlowInvocationTag {
  flowName: string;
  flowRunId: string;
  stepId: string;
}

export interface InvokeOptions {
  flow?: FlowInvocationTag;
}

export interface ToolRegistryPort {
  register(name: string, source: string, options?: RegisterOptions): ToolRecord;
  get(name: string): ToolRecord;
  has(name: string): boolean;
  invoke(name: string, params: Record<string, unknown>, options?: InvokeOptions): Promise<unknown>;
  describe(name: string): ToolDescription;
  getSource(name: string): string;
  list(): string[];
  remove(name: string): void;
}
