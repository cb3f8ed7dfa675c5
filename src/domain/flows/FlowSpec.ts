import { z } from "zod";
import type { JsonValue } from "../../ports/sys/AuditLogPort";
import { ValidationError } from "../../shared/errors";

export const FLOW_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

const stepDocumentSchema = z.object({
  id: z.string().min(1).optional(),
  tool: z.string().min(1, "step tool must be a non-empty string"),
  params: z.record(jsonValue).default({}),
  save_as: z.string().min(1).optional(),
});

/** Persisted flow document, one JSON file per flow. */
export const flowDocumentSchema = z.object({
  name: z.string().regex(FLOW_NAME_PATTERN, "flow name may only use letters, digits, '_' and '-'"),
  description: z.string().default(""),
  inputs: z.array(z.string().min(1)).default([]),
  steps: z.array(stepDocumentSchema),
  output: jsonValue.optional(),
});

export type FlowDocument = z.input<typeof flowDocumentSchema>;

export interface StepSpec {
  id: string;
  tool: string;
  params: Record<string, JsonValue>;
  /** Context key the result is stored under; the step id when absent. */
  saveAs?: string;
}

export interface FlowSpec {
  name: string;
  description: string;
  inputs: string[];
  steps: StepSpec[];
  /** Placeholder or literal. Without one the run returns the last step's result. */
  output?: JsonValue;
}

/**
 * Validates a flow document's shape and normalizes it into a FlowSpec. Steps
 * without an id get `step_<n>`. Only structure is checked here; tool existence
 * is the engine's concern.
 */
export function parseFlowDocument(input: unknown): FlowSpec {
  const parsed = flowDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length ? issue.path.join(".") : "flow";
    throw new ValidationError(`Invalid flow spec at ${where}: ${issue.message}`, where);
  }

  const doc = parsed.data;
  const steps = doc.steps.map((step, index): StepSpec => {
    const spec: StepSpec = {
      id: step.id ?? `step_${index + 1}`,
      tool: step.tool,
      params: step.params,
    };
    if (step.save_as !== undefined) spec.saveAs = step.save_as;
    return spec;
  });

  const spec: FlowSpec = {
    name: doc.name,
    description: doc.description,
    inputs: doc.inputs,
    steps,
  };
  if (doc.output !== undefined) spec.output = doc.output;
  return spec;
}

export function toFlowDocument(spec: FlowSpec): FlowDocument {
  return {
    name: spec.name,
    description: spec.description,
    inputs: [...spec.inputs],
    steps: spec.steps.map((step) => ({
      id: step.id,
      tool: step.tool,
      params: { ...step.params },
      ...(step.saveAs !== undefined ? { save_as: step.saveAs } : {}),
    })),
    ...(spec.output !== undefined ? { output: spec.output } : {}),
  };
}

export function contextKeyOf(step: StepSpec): string {
  return step.saveAs ?? step.id;
}
