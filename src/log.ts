/**
 * Leveled stderr logging. Stdout is reserved for the MCP stdio transport,
 * so every line goes through console.error.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function normalizeLogLevel(value: unknown): LogLevel {
  const v = String(value ?? "").trim().toLowerCase();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "info";
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, detail?: unknown): void;
  info(message: string, detail?: unknown): void;
  warn(message: string, detail?: unknown): void;
  error(message: string, detail?: unknown): void;
}

function formatDetail(detail: unknown): string {
  if (detail === undefined) return "";
  if (detail instanceof Error) return ` ${detail.message}`;
  if (typeof detail === "string") return ` ${detail}`;
  try {
    return ` ${JSON.stringify(detail)}`;
  } catch {
    return ` ${String(detail)}`;
  }
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, detail?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    console.error(`${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}${formatDetail(detail)}`);
  };
  return {
    debug: (message, detail) => write("debug", message, detail),
    info: (message, detail) => write("info", message, detail),
    warn: (message, detail) => write("warn", message, detail),
    error: (message, detail) => write("error", message, detail),
  };
}

/** Mask the local part of an address for request logs: abc***@domain. */
export function maskAddress(address: string): string {
  const at = address.indexOf("@");
  if (at < 0) return address;
  return `${address.slice(0, Math.min(3, at))}***${address.slice(at)}`;
}
