import { createWriteStream, mkdirSync } from "fs";
import path from "path";
import { inspect } from "util";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console; resolves once the log file is flushed. */
  shutdown(): Promise<void>;
}

type ConsoleMethod = "log" | "debug" | "info" | "warn" | "error";

const MIRRORED: ConsoleMethod[] = ["log", "debug", "info", "warn", "error"];

type MirroredConsole = Pick<Console, ConsoleMethod>;

export function formatLogArgs(args: unknown[]): string {
  return args
    .map((arg) => (typeof arg === "string" ? arg : inspect(arg, { depth: 4, breakLength: Infinity })))
    .join(" ");
}

/**
 * Mirrors the output of `consoles` into `logFile` (appending) until `shutdown`
 * restores their original methods. Without a file this is a no-op.
 */
export function initializeLogging(
  logFile?: string,
  consoles: MirroredConsole[] = [console]
): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => Promise.resolve(),
    };
  }

  const resolvedLog = path.resolve(logFile);
  mkdirSync(path.dirname(resolvedLog), { recursive: true });

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- flowsmith session started ---\n`);

  const restores: Array<() => void> = [];
  for (const target of consoles) {
    for (const level of MIRRORED) {
      const original = target[level];
      const write = original.bind(target);
      target[level] = (...args: unknown[]) => {
        write(...args);
        stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${formatLogArgs(args)}\n`);
      };
      restores.push(() => {
        target[level] = original;
      });
    }
  }

  let closed: Promise<void> | null = null;
  const shutdown = () => {
    if (closed) return closed;
    for (const restore of restores) restore();
    stream.write(`[${new Date().toISOString()}] --- flowsmith session ended ---\n`);
    closed = new Promise<void>((resolve) => stream.end(resolve));
    return closed;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
