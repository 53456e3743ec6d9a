import path from "node:path";
import fs from "node:fs/promises";

/**
 * Leveled key=value logging for the guard.
 *
 * Lines go to stderr only; stdout belongs to the host protocol. The default
 * level is "off" so an idle guard stays silent.
 */

export type LogLevel = "off" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["off", "error", "warn", "info", "debug"];

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type Logger = {
  error(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  debug(event: string, fields?: LogFields): void;
};

export type LoggerOptions = {
  level: LogLevel;
  tag?: string;
  sink?: (line: string) => void;
};

const severity: Record<LogLevel, number> = { off: 0, error: 1, warn: 2, info: 3, debug: 4 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function formatValue(value: string | number | boolean | null): string {
  const s = String(value);
  return /[\s"=]/.test(s) ? JSON.stringify(s) : s;
}

export function formatFields(event: string, fields: LogFields = {}): string {
  const parts = [`event=${event}`];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

export function createLogger(options: LoggerOptions): Logger {
  const tag = options.tag ?? "edit-scale-guard";
  const sink = options.sink ?? ((line: string) => console.error(line));
  const threshold = severity[options.level];

  const emit = (level: Exclude<LogLevel, "off">) => (event: string, fields?: LogFields) => {
    if (severity[level] > threshold) return;
    sink(`[${tag}] ${level} ${formatFields(event, fields)}`);
  };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}

export const silentLogger: Logger = createLogger({ level: "off" });

/**
 * Append one JSON line to the audit log. Failures are reported through the
 * logger and never propagate.
 */
export async function appendAudit(
  auditPath: string | undefined,
  record: Record<string, unknown>,
  logger: Logger = silentLogger,
): Promise<void> {
  if (!auditPath) return;
  try {
    await fs.mkdir(path.dirname(auditPath), { recursive: true });
    await fs.appendFile(auditPath, JSON.stringify({ ts: new Date().toISOString(), ...record }) + "\n", "utf8");
  } catch (err) {
    logger.warn("audit_write_failed", { path: auditPath, error: err instanceof Error ? err.message : String(err) });
  }
}
