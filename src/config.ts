import fs from "fs";
import path from "path";

export interface GeneratorConfig {
  model?: string;
}

export interface AppConfig {
  toolsDir?: string;
  flowsDir?: string;
  logDir?: string;
  generator?: GeneratorConfig;
}

const DEFAULT_CONFIG_FILENAMES = ["flowsmith.config.json", "config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed, path.dirname(resolved)), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

/** Directory settings are resolved against the folder holding the config file. */
function normalizeConfig(input: unknown, baseDir: string): AppConfig {
  const out: AppConfig = {};
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    console.warn("Config file must contain a JSON object; ignoring it.");
    return out;
  }
  const source: object = input;

  const dir = (key: "toolsDir" | "flowsDir" | "logDir") => {
    const value: unknown = Reflect.get(source, key);
    if (value === undefined) return;
    if (typeof value === "string" && value.trim()) {
      out[key] = path.resolve(baseDir, value.trim());
    } else {
      console.warn(`Invalid "${key}" in config; expected a non-empty string.`);
    }
  };
  dir("toolsDir");
  dir("flowsDir");
  dir("logDir");

  const generator: unknown = Reflect.get(source, "generator");
  if (generator && typeof generator === "object") {
    const model: unknown = Reflect.get(generator, "model");
    out.generator = typeof model === "string" && model.trim() ? { model: model.trim() } : {};
  }

  return out;
}
