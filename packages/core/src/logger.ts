/**
 * logger.ts
 *
 * Leveled, single-line logger tagged with the emitting component.
 * The minimum level comes from LOG_LEVEL (debug | info | warn | error | silent).
 */

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug:  0,
  info:   1,
  warn:   2,
  error:  3,
  silent: 4,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase() ?? "info";
  return isLogLevel(raw) ? raw : "info";
}

// JSON.stringify cannot serialize bigint amounts
function stringify(data: Record<string, unknown>): string {
  return JSON.stringify(data, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

export function createLogger(component: string, minLevel?: LogLevel): Logger {
  const write = (level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>) => {
    const threshold = minLevel ?? envLevel();
    if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) return;

    const timestamp = new Date().toISOString().replace("T", " ").replace("Z", "");
    let line = `[${timestamp}] ${level.toUpperCase().padEnd(5)} [${component}] ${message}`;
    if (data && Object.keys(data).length > 0) {
      line += ` ${stringify(data)}`;
    }

    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info:  (message, data) => write("info", message, data),
    warn:  (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}
