import type { DiffLogger } from "@mydiff/diff";
import pino from "pino";
import { z } from "zod";
import { getConfig } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export type Logger = pino.Logger;

// =============================================================================
// Module name extraction
// =============================================================================

function getModuleName(module: string | ImportMeta): string {
  const moduleUrl = typeof module === "string" ? module : module.url;
  const lastSlashIndex = moduleUrl.lastIndexOf("/");
  const fileNameWithExtension =
    lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
  const parts = fileNameWithExtension.split(".");
  return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

// =============================================================================
// Pretty formatting (inline, no transport needed)
// =============================================================================

const LEVEL_COLORS: Record<number, string> = {
  10: "\x1b[90m", // trace - gray
  20: "\x1b[36m", // debug - cyan
  30: "\x1b[32m", // info - green
  40: "\x1b[33m", // warn - yellow
  50: "\x1b[31m", // error - red
  60: "\x1b[35m", // fatal - magenta
};

const LEVEL_NAMES: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

const RESET = "\x1b[0m";

const LogLineSchema = z
  .object({
    time: z.number(),
    level: z.number(),
    module: z.string().optional(),
    msg: z.string().optional(),
  })
  .passthrough();

const HIDDEN_KEYS = new Set(["time", "level", "module", "msg", "pid", "hostname"]);

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function formatDetails(record: Record<string, unknown>): string {
  const details = Object.entries(record)
    .filter(([key]) => !HIDDEN_KEYS.has(key))
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  return details.length > 0 ? ` ${details.join(" ")}` : "";
}

/**
 * One colored line per record on stderr, so stdout stays free for command
 * output.
 */
export function formatLogLine(chunk: string, color: boolean): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(chunk);
  } catch {
    return chunk;
  }
  const record = LogLineSchema.safeParse(parsed);
  if (!record.success) return chunk;

  const { time, level, module = "unknown", msg = "" } = record.data;
  const levelName = LEVEL_NAMES[level] ?? "LOG";
  const head = `[${formatTime(time)}] ${levelName}`;
  const painted = color ? `${LEVEL_COLORS[level] ?? ""}${head}${RESET}` : head;
  return `${painted} ${module} - ${msg}${formatDetails(record.data)}\n`;
}

function prettyDestination(color: boolean): pino.DestinationStream {
  return {
    write(chunk: string): void {
      process.stderr.write(formatLogLine(chunk, color));
    },
  };
}

// =============================================================================
// Logger creation
// =============================================================================

let rootLogger: pino.Logger | undefined;

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    const config = getConfig();
    rootLogger = pino({ level: config.MYDIFF_LOG_LEVEL }, prettyDestination(!config.NO_COLOR));
  }
  return rootLogger;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * Call `getLog(import.meta)` where the logger is needed, not at module load: the first
 * call reads the configuration, which may be invalid.
 *
 * @param module the module meta or module name
 */
export function getLog(module: string | ImportMeta): Logger {
  return getRootLogger().child({ module: getModuleName(module) });
}

/**
 * Route the diff engine's progress reports into a pino logger.
 */
export function toDiffLogger(logger: Logger): DiffLogger {
  return {
    debug: (message, details) => logger.debug(details ?? {}, message),
    info: (message, details) => logger.info(details ?? {}, message),
    warn: (message, details) => logger.warn(details ?? {}, message),
    error: (message, details) => logger.error(details ?? {}, message),
  };
}
