import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { ZodError } from "zod";
import { ConfigSchema } from "../../adapters/validation.js";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigurationError } from "../../core/domain/errors.js";

/** Environment variables that win over the YAML storage section when set. */
const STORAGE_ENV_OVERRIDES = {
  STORAGE_BUCKET: "bucket",
  STORAGE_ENDPOINT: "endpoint",
  STORAGE_ACCESS_KEY: "accessKeyId",
  STORAGE_SECRET_KEY: "secretAccessKey",
  STORAGE_CDN_URL: "cdnUrl",
} as const;

const PLACEHOLDER = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

/** Replaces `${VAR}` strings with the variable's value; unset variables become "". */
export function substituteEnv(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === "string") {
    const match = PLACEHOLDER.exec(value);
    return match ? (env[match[1]] ?? "") : value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function applyStorageOverrides(
  parsed: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const storage: Record<string, unknown> = isRecord(parsed.storage)
    ? { ...parsed.storage }
    : {};
  for (const [name, field] of Object.entries(STORAGE_ENV_OVERRIDES)) {
    const value = env[name]?.trim();
    if (value) storage[field] = value;
  }
  return { ...parsed, storage };
}

function describeIssues(err: ZodError): string[] {
  return err.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path} (${issue.message})`;
  });
}

export function loadConfig(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): Config {
  loadEnv();
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to load config from ${configPath}. ${msg}`, {
      cause: e,
    });
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid YAML in ${configPath}. ${msg}`, { cause: e });
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config at ${configPath} must be a YAML object.`);
  }

  const withEnv = substituteEnv(parsed, env);
  const candidate = applyStorageOverrides(isRecord(withEnv) ? withEnv : {}, env);
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config at ${configPath}`,
      describeIssues(result.error),
    );
  }
  return result.data;
}

/**
 * Resolves the configuration file path based on environment variables or default locations.
 */
export function getConfigPath(): string {
  return (
    process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml")
  );
}
