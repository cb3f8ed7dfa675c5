export { Workbench } from "./app/Workbench";
export { FlowEngine, type FlowEngineOptions } from "./app/FlowEngine";
export {
  createWorkbenchContext,
  type WorkbenchContext,
  type WorkbenchOptions,
} from "./composition/container";
export { SourceToolRegistry, type CatalogEntry } from "./adapters/tools/SourceToolRegistry";
export { VmToolLoader } from "./adapters/tools/VmToolLoader";
export { OpenAiToolGenerator } from "./adapters/tools/OpenAiToolGenerator";
export { JsonFlowLibrary } from "./adapters/flows/JsonFlowLibrary";
export { FileDocumentStore } from "./adapters/sys/FileDocumentStore";
export { JsonlAuditLog } from "./adapters/sys/JsonlAuditLog";
export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { runCli, type CliIO } from "./cli";
export { loadConfig, type AppConfig } from "./config";
export type { ToolRecord, ToolDescription, ParameterDescriptor } from "./domain/tools/ToolRecord";
export type { FlowSpec, StepSpec, FlowDocument } from "./domain/flows/FlowSpec";
export type { ToolRunEntry, FlowRunEntry } from "./domain/audit/entries";
export type { LoggerPort } from "./ports/sys/LoggerPort";
export type { ToolGeneratorPort } from "./ports/tools/ToolGeneratorPort";
export type { ToolRegistryPort } from "./ports/tools/ToolRegistryPort";
export * from "./shared/errors";
