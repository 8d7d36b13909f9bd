import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

/**
 * Configuration schema definition
 */
const configSchema = {
  // Bytes per chunk pair diffed by `create` (overridden by --chunk-size)
  MYDIFF_CHUNK_SIZE: z.coerce.number().int().positive().default(1024 * 1024),

  // Log level for the pino logger
  MYDIFF_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),

  // Any non-empty value turns ANSI colors off
  NO_COLOR: z
    .string()
    .optional()
    .transform((value) => value !== undefined),
};

type ConfigSchema = typeof configSchema;
export type Config = {
  [K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

/**
 * Parse a .env file content into key-value pairs.
 * Supports `KEY=value` lines with optional quotes; `#` starts a comment line.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

function loadEnvFile(path: string): Record<string, string> {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
  return parseEnvFile(content);
}

function parseSetting<T extends z.ZodTypeAny>(
  key: keyof ConfigSchema,
  schema: T,
  value: string | undefined,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reasons = result.error.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Invalid ${key}: ${reasons}`);
  }
  return result.data;
}

/**
 * Process environment first, then `.env` in the working directory.
 *
 * @throws Error naming the first setting that fails validation
 */
function createConfig(): Config {
  const envFromFile = loadEnvFile(join(process.cwd(), ".env"));

  function getEnvValue(key: keyof ConfigSchema): string | undefined {
    const envValue = process.env[key] ?? envFromFile[key];
    // Empty strings fall back to defaults
    return envValue === "" ? undefined : envValue;
  }

  const setting = <K extends keyof ConfigSchema>(key: K) =>
    parseSetting(key, configSchema[key], getEnvValue(key));

  return {
    MYDIFF_CHUNK_SIZE: setting("MYDIFF_CHUNK_SIZE"),
    MYDIFF_LOG_LEVEL: setting("MYDIFF_LOG_LEVEL"),
    NO_COLOR: setting("NO_COLOR"),
  };
}

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
  if (!currentConfig) {
    currentConfig = createConfig();
  }
  return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
  currentConfig = undefined;
}
