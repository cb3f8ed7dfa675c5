#!/usr/bin/env node
import { Workbench } from "./app/Workbench";
import { createCliLogger, runCli, stderrConsole } from "./cli";
import { DEBUG_MODE, LOG_FILE } from "./env";
import { initializeLogging } from "./runtime/logging";

async function main(): Promise<number> {
  const loggingHandle = initializeLogging(LOG_FILE, [console, stderrConsole]);
  try {
    const workbench = Workbench.create({ logger: createCliLogger(DEBUG_MODE) });
    return await runCli(process.argv.slice(2), workbench);
  } finally {
    await loggingHandle.shutdown();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
