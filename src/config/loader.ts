/**
 * YAML config loader with ${ENV} expansion and zod validation.
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { resolvePathLike } from "../utils/paths.js";
import { configSchema, type Config } from "./schema.js";

const log = createLogger("config");

const ENV_PATTERN = /\$\{([A-Z0-9_]+)\}/g;

export function expandEnvVars(
  raw: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return raw.replace(ENV_PATTERN, (_, name: string) => {
    const value = env[name];
    if (value === undefined) {
      log.warn({ name }, "config references unset environment variable");
      return "";
    }
    return value;
  });
}

export function parseConfig(
  raw: string,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  let data: unknown;
  try {
    data = parse(expandEnvVars(raw, env));
  } catch (err) {
    throw new ConfigError(`Invalid YAML: ${errorMessage(err)}`);
  }

  const result = configSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ConfigError(
      "Invalid config",
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  const config = result.data;
  if (config.ledger.dir) {
    config.ledger.dir = resolvePathLike(config.ledger.dir);
  }
  return config;
}

export async function loadConfig(path: string): Promise<Config> {
  const resolved = resolvePathLike(path);
  let raw: string;
  try {
    raw = await readFile(resolved, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    throw err;
  }

  const config = parseConfig(raw);
  log.debug({ path: resolved, agents: config.agents.length }, "config loaded");
  return config;
}
