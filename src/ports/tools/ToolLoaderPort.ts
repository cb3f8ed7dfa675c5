import type { ToolCallable, ToolSignature } from "../../domain/tools/ToolRecord";

export interface CompiledTool {
  callable: ToolCallable;
  signature: ToolSignature;
}

export interface ToolLoaderPort {
  /**
   * Turns source text into an isolated callable named `name` plus its reflected
   * signature. Throws ValidationError when the source cannot provide one.
   */
  compile(name: string, source: string, sourcePath: string): CompiledTool;
}
