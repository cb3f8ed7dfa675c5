export type ErrorCode = "not_found" | "validation" | "reference" | "execution";

export class FlowsmithError extends Error {
  constructor(readonly code: ErrorCode, message: string) {
    super(message);
    this.name = "FlowsmithError";
  }
}

/** Unknown tool or flow name. */
export class NotFoundError extends FlowsmithError {
  constructor(readonly kind: "tool" | "flow", readonly subject: string, detail?: string) {
    super(
      "not_found",
      detail ?? `The ${kind} "${subject}" does not exist or could not be loaded.`
    );
    this.name = "NotFoundError";
  }
}

export class ValidationError extends FlowsmithError {
  constructor(message: string, readonly field?: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

/**
 * A `$inputs.*` or `$ctx.*` placeholder that cannot be resolved, including
 * references to steps that have not run yet.
 */
export class UnresolvedReferenceError extends FlowsmithError {
  constructor(readonly expression: string, readonly scope: "inputs" | "ctx") {
    super(
      "reference",
      `Flow reference "${expression}" could not be resolved from ${
        scope === "inputs" ? "inputs" : "context"
      }.`
    );
    this.name = "UnresolvedReferenceError";
  }
}

export interface ErrorInfo {
  type: string;
  message: string;
}

/**
 * Tool code runs in its own vm context, so its errors fail `instanceof Error`
 * checks here; read name and message structurally instead.
 */
export function describeError(err: unknown): ErrorInfo {
  if (typeof err === "object" && err !== null) {
    const name = "name" in err && typeof err.name === "string" ? err.name : undefined;
    const message = "message" in err && typeof err.message === "string" ? err.message : undefined;
    if (name !== undefined || message !== undefined) {
      return { type: name || "Error", message: message ?? "" };
    }
  }
  return { type: typeof err, message: String(err) };
}

export class ExecutionError extends FlowsmithError {
  readonly causeType: string;
  readonly causeMessage: string;

  constructor(
    readonly toolName: string,
    cause: ErrorInfo,
    readonly stepId: string | null = null
  ) {
    super(
      "execution",
      stepId
        ? `Step "${stepId}" failed: tool "${toolName}" raised ${cause.type}: ${cause.message}`
        : `Tool "${toolName}" raised ${cause.type}: ${cause.message}`
    );
    this.name = "ExecutionError";
    this.causeType = cause.type;
    this.causeMessage = cause.message;
  }

  /** Copy of this error tagged with the flow step it surfaced from. */
  atStep(stepId: string): ExecutionError {
    return new ExecutionError(
      this.toolName,
      { type: this.causeType, message: this.causeMessage },
      stepId
    );
  }
}

export function isFlowsmithError(err: unknown): err is FlowsmithError {
  return err instanceof FlowsmithError;
}
