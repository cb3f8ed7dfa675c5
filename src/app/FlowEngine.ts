import { randomUUID } from "crypto";
import type { AuditLogPort } from "../ports/sys/AuditLogPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { FlowLibraryPort } from "../ports/flows/FlowLibraryPort";
import type { ToolRegistryPort } from "../ports/tools/ToolRegistryPort";
import { contextKeyOf, parseFlowDocument, type FlowSpec } from "../domain/flows/FlowSpec";
import { resolveParams, resolveValue, type ResolutionScope } from "../domain/flows/placeholders";
import {
  flowStreamId,
  normalizeLimit,
  readFlowRuns,
  summarizeResult,
  type FlowRunEntry,
} from "../domain/audit/entries";
import { ExecutionError, NotFoundError, ValidationError } from "../shared/errors";

export interface FlowEngineOptions {
  tools: ToolRegistryPort;
  library: FlowLibraryPort;
  audit: AuditLogPort;
  logger: LoggerPort;
  now?: () => number;
  newRunId?: () => string;
}

/**
 * Runs flows: ordered tool invocations whose params are literals or
 * `$inputs.*` / `$ctx.*` placeholders. Execution is strictly sequential and the
 * first failing step ends the run.
 */
export class FlowEngine {
  private readonly tools: ToolRegistryPort;
  private readonly library: FlowLibraryPort;
  private readonly audit: AuditLogPort;
  private readonly logger: LoggerPort;
  private readonly now: () => number;
  private readonly newRunId: () => string;

  constructor(options: FlowEngineOptions) {
    this.tools = options.tools;
    this.library = options.library;
    this.audit = options.audit;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.newRunId = options.newRunId ?? (() => randomUUID().replace(/-/g, ""));
  }

  /** Validates and stores a flow, replacing any previous flow of that name. */
  save(input: unknown): FlowSpec {
    const spec = parseFlowDocument(input);

    if (!spec.steps.length) {
      throw new ValidationError(`Flow "${spec.name}" must have at least one step.`, "steps");
    }
    const seen = new Set<string>();
    for (const step of spec.steps) {
      if (seen.has(step.id)) {
        throw new ValidationError(`Duplicate flow step id "${step.id}".`, "steps");
      }
      seen.add(step.id);
    }
    for (const step of spec.steps) {
      if (!this.tools.has(step.tool)) {
        throw new ValidationError(
          `Flow step "${step.id}" references unknown tool "${step.tool}".`,
          "steps"
        );
      }
    }

    this.library.save(spec);
    this.logger.info("Saved flow", { name: spec.name, steps: spec.steps.length });
    return spec;
  }

  list(): string[] {
    return this.library.list();
  }

  describe(name: string): FlowSpec {
    const spec = this.library.get(name);
    if (!spec) throw new NotFoundError("flow", name);
    return spec;
  }

  remove(name: string): void {
    if (!this.library.remove(name)) throw new NotFoundError("flow", name);
    this.logger.info("Removed flow", { name });
  }

  async run(name: string, inputs: Record<string, unknown> = {}): Promise<unknown> {
    const spec = this.describe(name);

    const missing = spec.inputs.filter(
      (key) => !Object.prototype.hasOwnProperty.call(inputs, key)
    );
    if (missing.length) {
      throw new ValidationError(`Missing required flow inputs: ${missing.join(", ")}`, "inputs");
    }
    for (const step of spec.steps) {
      if (!this.tools.has(step.tool)) {
        throw new NotFoundError(
          "tool",
          step.tool,
          `Flow step "${step.id}" references tool "${step.tool}", which is no longer registered.`
        );
      }
    }

    const flowRunId = this.newRunId();
    const scope: ResolutionScope = { inputs, ctx: new Map() };
    const startedAt = this.now();
    this.logger.debug("Running flow", { name, flowRunId });

    let lastResult: unknown = null;
    for (const step of spec.steps) {
      const params = resolveParams(step.params, scope);
      let result: unknown;
      try {
        result = await this.tools.invoke(step.tool, params, {
          flow: { flowName: name, flowRunId, stepId: step.id },
        });
      } catch (err) {
        if (err instanceof ExecutionError) {
          this.logger.warn("Flow step failed", { name, flowRunId, step: step.id });
          throw err.atStep(step.id);
        }
        throw err;
      }
      // a repeated save_as overwrites the earlier value
      scope.ctx.set(contextKeyOf(step), result);
      lastResult = result;
    }

    const output = spec.output === undefined ? lastResult : resolveValue(spec.output, scope);
    this.recordOutput(name, flowRunId, startedAt, output);
    return output;
  }

  getRuns(name: string, limit?: number): FlowRunEntry[] {
    this.describe(name);
    return readFlowRuns(this.audit, name, normalizeLimit(limit));
  }

  private recordOutput(name: string, flowRunId: string, startedAt: number, output: unknown): void {
    const finishedAt = this.now();
    const entry: FlowRunEntry = {
      flowRunId,
      flowName: name,
      stepId: null,
      tool: null,
      params: {},
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
      status: "success",
      error: null,
      resultSummary: summarizeResult(output),
    };
    this.audit.append(flowStreamId(name), entry);
  }
}
