import { config } from 'dotenv';

config();

export const OPENAI_API_KEY = process.env.OPENAI_API_KEY;
export const OPENAI_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini';
export const TOOLS_DIR = process.env.FLOWSMITH_TOOLS_DIR || 'tools';
export const FLOWS_DIR = process.env.FLOWSMITH_FLOWS_DIR || 'flows';
export const LOG_DIR = process.env.FLOWSMITH_LOG_DIR || 'tool_logs';
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let logFileArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;

/** Flags consumed above; command parsing skips them. */
export const GLOBAL_FLAGS_WITH_VALUE = ['--config', '--log-file'];
export const GLOBAL_FLAGS = ['--debug', '--no-debug'];
