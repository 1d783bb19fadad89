import "dotenv/config";
import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";
import configSchema from "./config.schema.json";
import { DEFAULT_CONFIG, mergeConfig, type ConfigPatch, type HealgateConfig } from "./config";
import { ConfigError } from "../errors";
import { getErrorMessage } from "../utils/helpers";
import { checkSchema } from "../utils/validateSchema";

const DEFAULT_CONFIG_FILE = "healgate.yaml";

/** Config file path: HEALGATE_CONFIG, else healgate.yaml in the working directory */
export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(process.cwd(), env.HEALGATE_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/**
 * Parse and validate a YAML config document and overlay it on the
 * defaults. An empty document yields the defaults.
 */
export function parseConfig(raw: string, source = "config"): HealgateConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw) ?? {};
  } catch (err) {
    throw new ConfigError(source, getErrorMessage(err));
  }

  const result = checkSchema<ConfigPatch>(configSchema, parsed);
  if (!result.valid) {
    throw new ConfigError(
      source,
      result.issues.map((i) => `${i.field} ${i.message}`).join(", "),
    );
  }

  const config = mergeConfig(DEFAULT_CONFIG, result.data);
  const { zWarning, zCritical } = config.classifier;
  if (zCritical <= zWarning) {
    throw new ConfigError(source, "classifier.zCritical must exceed zWarning");
  }
  return config;
}

/**
 * Load configuration. A missing default file means defaults; a missing
 * file named by HEALGATE_CONFIG is an error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HealgateConfig {
  const file = configPath(env);
  if (!fs.existsSync(file)) {
    if (env.HEALGATE_CONFIG) {
      throw new ConfigError(file, "config file not found");
    }
    return DEFAULT_CONFIG;
  }
  return parseConfig(fs.readFileSync(file, "utf-8"), file);
}
