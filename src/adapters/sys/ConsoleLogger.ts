import type { LoggerPort, LogLevel } from "../../ports/sys/LoggerPort";

/** Where lines go; the global console unless a process wants them elsewhere. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface ConsoleLoggerOptions {
  scope?: string;
  debug?: boolean;
  sink?: LogSink;
}

function format(scope: string | undefined, message: string, meta?: Record<string, unknown>): string {
  const prefixed = scope ? `[${scope}] ${message}` : message;
  if (!meta || !Object.keys(meta).length) return prefixed;
  try {
    return `${prefixed} ${JSON.stringify(meta)}`;
  } catch {
    return `${prefixed} ${String(meta)}`;
  }
}

export class ConsoleLogger implements LoggerPort {
  private readonly scope?: string;
  private readonly debugEnabled: boolean;
  private readonly sink?: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.scope = options.scope;
    this.debugEnabled = options.debug ?? false;
    this.sink = options.sink;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    this.write("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      debug: this.debugEnabled,
      sink: this.sink,
    });
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const payload = format(this.scope, message, meta);
    // resolved per call so a console patched later (log mirroring, tests) still sees it
    const sink = this.sink ?? console;
    switch (level) {
      case "debug":
        return sink.debug(payload);
      case "info":
        return sink.info(payload);
      case "warn":
        return sink.warn(payload);
      case "error":
        return sink.error(payload);
    }
  }
}
