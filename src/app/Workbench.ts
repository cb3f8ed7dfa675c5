import {
  createWorkbenchContext,
  type WorkbenchContext,
  type WorkbenchOptions,
} from "../composition/container";
import type { RegisterOptions } from "../ports/tools/ToolRegistryPort";
import type { ToolDescription, ToolRecord } from "../domain/tools/ToolRecord";
import type { FlowSpec } from "../domain/flows/FlowSpec";
import type { FlowRunEntry, ToolRunEntry } from "../domain/audit/entries";
import type { CatalogEntry } from "../adapters/tools/SourceToolRegistry";
import { ValidationError } from "../shared/errors";

/**
 * The object callers hold: forwards to the registry and the flow engine of the
 * current context.
 *
 * `reconfigure` swaps the whole context in one assignment. Calling it while
 * registry or engine operations are in flight is not supported; callers that
 * share a Workbench across tasks must serialize reconfiguration themselves.
 */
export class Workbench {
  private current: WorkbenchContext;

  constructor(context: WorkbenchContext) {
    this.current = context;
  }

  static create(options: WorkbenchOptions = {}): Workbench {
    return new Workbench(createWorkbenchContext(options));
  }

  get context(): WorkbenchContext {
    return this.current;
  }

  reconfigure(options: WorkbenchOptions = {}): WorkbenchContext {
    const next = createWorkbenchContext(options);
    this.current = next;
    return next;
  }

  // tools

  async createTool(name: string, description: string, options: RegisterOptions = {}): Promise<ToolRecord> {
    const { generator, tools, logger } = this.current;
    if (!generator) {
      throw new ValidationError("No tool generator is configured.", "generator");
    }
    if (!options.overwrite && tools.has(name)) {
      throw new ValidationError(`Tool "${name}" already exists; pass overwrite to replace it.`, "name");
    }
    const source = await generator.generate(name, description);
    logger.debug("Generated tool source", { name, length: source.length });
    return tools.register(name, source, options);
  }

  registerTool(name: string, source: string, options: RegisterOptions = {}): ToolRecord {
    return this.current.tools.register(name, source, options);
  }

  listTools(): string[] {
    return this.current.tools.list();
  }

  describeTool(name: string): ToolDescription {
    return this.current.tools.describe(name);
  }

  getToolSource(name: string): string {
    return this.current.tools.getSource(name);
  }

  getToolCatalog(): CatalogEntry[] {
    return this.current.tools.catalog();
  }

  useTool(name: string, params: Record<string, unknown> = {}): Promise<unknown> {
    return this.current.tools.invoke(name, params);
  }

  getToolRuns(name: string, limit?: number): ToolRunEntry[] {
    return this.current.tools.getRuns(name, limit);
  }

  removeTool(name: string): void {
    this.current.tools.remove(name);
  }

  // flows

  createFlow(spec: unknown): { name: string; steps: number } {
    const saved = this.current.engine.save(spec);
    return { name: saved.name, steps: saved.steps.length };
  }

  listFlows(): string[] {
    return this.current.engine.list();
  }

  describeFlow(name: string): FlowSpec {
    return this.current.engine.describe(name);
  }

  runFlow(name: string, inputs: Record<string, unknown> = {}): Promise<unknown> {
    return this.current.engine.run(name, inputs);
  }

  getFlowRuns(name: string, limit?: number): FlowRunEntry[] {
    return this.current.engine.getRuns(name, limit);
  }

  removeFlow(name: string): void {
    this.current.engine.remove(name);
  }
}
