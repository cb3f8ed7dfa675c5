import fs from "fs";
import nodeConsole from "console";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
import type { Workbench } from "./app/Workbench";
import { GLOBAL_FLAGS, GLOBAL_FLAGS_WITH_VALUE } from "./env";
import { describeError, ValidationError } from "./shared/errors";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(filePath: string): string;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readFile: (filePath) => fs.readFileSync(filePath, "utf8"),
};

/** Logging for the command line; stdout is reserved for command results. */
export const stderrConsole = new nodeConsole.Console({ stdout: process.stderr, stderr: process.stderr });

export function createCliLogger(debug: boolean): ConsoleLogger {
  return new ConsoleLogger({ scope: "flowsmith", debug, sink: stderrConsole });
}

export const USAGE = `Usage: flowsmith [--config <file>] [--log-file <file>] [--debug] <command>

Commands:
  tools                          list registered tools
  describe <tool>                show a tool's signature and docs
  source <tool>                  print a tool's source
  create <tool> <description...> generate a tool with the LLM
  use <tool> [json]              invoke a tool with named params
  tool-runs <tool> [limit]       show recent runs of a tool
  remove <tool>                  delete a tool
  flows                          list saved flows
  flow <name>                    show a flow
  save-flow <file>               save a flow from a JSON file
  run <flow> [json]              run a flow with the given inputs
  runs <flow> [limit]            show recent runs of a flow
  remove-flow <name>             delete a flow`;

class UsageError extends Error {}

/** Drops the flags env.ts already consumed, with their values. */
export function stripGlobalFlags(argv: string[]): string[] {
  const rest: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (GLOBAL_FLAGS_WITH_VALUE.includes(arg)) {
      i++;
      continue;
    }
    if (GLOBAL_FLAGS.includes(arg)) continue;
    rest.push(arg);
  }
  return rest;
}

export function parseJsonObject(text: string | undefined, what: string): Record<string, unknown> {
  if (text === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${what} must be valid JSON: ${describeError(err).message}`, what);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ValidationError(`${what} must be a JSON object.`, what);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseLimit(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const limit = Number(text);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`limit must be a positive integer, got ${text}.`, "limit");
  }
  return limit;
}

function required(args: string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined || value === "") throw new UsageError(`missing <${name}>`);
  return value;
}

async function dispatch(command: string, args: string[], workbench: Workbench, io: CliIO): Promise<unknown> {
  switch (command) {
    case "tools":
      return workbench.getToolCatalog();
    case "describe":
      return workbench.describeTool(required(args, 0, "tool"));
    case "source":
      return workbench.getToolSource(required(args, 0, "tool"));
    case "create": {
      const name = required(args, 0, "tool");
      const description = args.slice(1).join(" ").trim();
      if (!description) throw new UsageError("missing <description>");
      const record = await workbench.createTool(name, description);
      return workbench.describeTool(record.name);
    }
    case "use":
      return workbench.useTool(required(args, 0, "tool"), parseJsonObject(args[1], "params"));
    case "tool-runs":
      return workbench.getToolRuns(required(args, 0, "tool"), parseLimit(args[1]));
    case "remove": {
      const name = required(args, 0, "tool");
      workbench.removeTool(name);
      return { removed: name };
    }
    case "flows":
      return workbench.listFlows();
    case "flow":
      return workbench.describeFlow(required(args, 0, "name"));
    case "save-flow": {
      const file = required(args, 0, "file");
      return workbench.createFlow(parseJsonValue(io.readFile(file), file));
    }
    case "run":
      return workbench.runFlow(required(args, 0, "flow"), parseJsonObject(args[1], "inputs"));
    case "runs":
      return workbench.getFlowRuns(required(args, 0, "flow"), parseLimit(args[1]));
    case "remove-flow": {
      const name = required(args, 0, "name");
      workbench.removeFlow(name);
      return { removed: name };
    }
    default:
      throw new UsageError(`unknown command "${command}"`);
  }
}

function parseJsonValue(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`${source} is not valid JSON: ${describeError(err).message}`, "file");
  }
}

function render(result: unknown): string {
  if (typeof result === "string") return result.replace(/\n$/, "");
  return JSON.stringify(result ?? null, null, 2);
}

/** Returns the process exit code: 0 on success, 1 on failure, 2 on bad usage. */
export async function runCli(argv: string[], workbench: Workbench, io: CliIO = processIO): Promise<number> {
  const [command, ...args] = stripGlobalFlags(argv);
  if (!command || command === "help" || command === "--help" || command === "-h") {
    io.stdout(USAGE);
    return command ? 0 : 2;
  }

  try {
    io.stdout(render(await dispatch(command, args, workbench, io)));
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`error: ${err.message}`);
      io.stderr(USAGE);
      return 2;
    }
    io.stderr(`error: ${describeError(err).message}`);
    return 1;
  }
}
