export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /** Same sink, messages prefixed with `[scope]`. */
  child(scope: string): LoggerPort;
}
