/**
 * ANSI coloring for terminal output. Everything is plain text when
 * `enabled` is false.
 */

export type Color = "red" | "green" | "yellow" | "blue" | "cyan" | "magenta" | "gray";

const CODES: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

export const RESET = "\x1b[0m";

export function paint(text: string, color: Color, enabled: boolean): string {
  return enabled ? `${CODES[color]}${text}${RESET}` : text;
}

/**
 * Aligned `name: value` lines with the names in blue.
 */
export function formatTable(rows: ReadonlyArray<[string, string]>, color: boolean): string[] {
  const width = Math.max(0, ...rows.map(([name]) => name.length));
  return rows.map(([name, value]) => `${paint(name.padEnd(width), "blue", color)}: ${value}`);
}

/**
 * Byte size in human-readable format
 */
export function formatSize(size: number): string {
  if (size < 1024) return `${size}B`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)}KB`;
  return `${(size / (1024 * 1024)).toFixed(2)}MB`;
}
