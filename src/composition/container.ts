import path from 'path';
import { loadConfig, type AppConfig } from '../config';
import { CONFIG_PATH, DEBUG_MODE, FLOWS_DIR, LOG_DIR, TOOLS_DIR } from '../env';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { FileDocumentStore } from '../adapters/sys/FileDocumentStore';
import { JsonlAuditLog } from '../adapters/sys/JsonlAuditLog';
import { VmToolLoader } from '../adapters/tools/VmToolLoader';
import { SourceToolRegistry } from '../adapters/tools/SourceToolRegistry';
import { OpenAiToolGenerator } from '../adapters/tools/OpenAiToolGenerator';
import { JsonFlowLibrary } from '../adapters/flows/JsonFlowLibrary';
import { FlowEngine } from '../app/FlowEngine';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import type { ToolGeneratorPort } from '../ports/tools/ToolGeneratorPort';

export interface WorkbenchOptions {
  toolsDir?: string;
  flowsDir?: string;
  logDir?: string;
  /** Config file to read; the default search is used when omitted. */
  configPath?: string;
  /** Set false to ignore config files entirely. */
  useConfigFile?: boolean;
  /** null disables tool generation; omitted uses the OpenAI generator. */
  generator?: ToolGeneratorPort | null;
  logger?: LoggerPort;
  debug?: boolean;
  now?: () => number;
  newRunId?: () => string;
}

export interface WorkbenchContext {
  readonly toolsDir: string;
  readonly flowsDir: string;
  readonly logDir: string;
  readonly logger: LoggerPort;
  readonly audit: JsonlAuditLog;
  readonly tools: SourceToolRegistry;
  readonly flows: JsonFlowLibrary;
  readonly engine: FlowEngine;
  readonly generator: ToolGeneratorPort | null;
}

/**
 * Builds a complete, loaded context. Explicit options win over the config
 * file, which wins over environment defaults.
 */
export function createWorkbenchContext(options: WorkbenchOptions = {}): WorkbenchContext {
  const appConfig: AppConfig =
    options.useConfigFile === false ? {} : loadConfig(options.configPath ?? CONFIG_PATH).config;

  const logger =
    options.logger ?? new ConsoleLogger({ scope: 'flowsmith', debug: options.debug ?? DEBUG_MODE });

  const toolsDir = path.resolve(options.toolsDir ?? appConfig.toolsDir ?? TOOLS_DIR);
  const flowsDir = path.resolve(options.flowsDir ?? appConfig.flowsDir ?? FLOWS_DIR);
  const logDir = path.resolve(options.logDir ?? appConfig.logDir ?? LOG_DIR);

  const audit = new JsonlAuditLog(logDir, logger.child('audit'));
  const tools = new SourceToolRegistry({
    store: new FileDocumentStore(toolsDir, '.ts'),
    loader: new VmToolLoader(),
    audit,
    logger: logger.child('tools'),
    now: options.now,
    newRunId: options.newRunId,
  });
  tools.load();

  const flows = new JsonFlowLibrary(new FileDocumentStore(flowsDir, '.json'), logger.child('flows'));
  flows.load();

  const engine = new FlowEngine({
    tools,
    library: flows,
    audit,
    logger: logger.child('engine'),
    now: options.now,
    newRunId: options.newRunId,
  });

  const generator =
    options.generator === undefined
      ? new OpenAiToolGenerator({ model: appConfig.generator?.model, logger: logger.child('generator') })
      : options.generator;

  return { toolsDir, flowsDir, logDir, logger, audit, tools, flows, engine, generator };
}
