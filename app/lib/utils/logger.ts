/**
 * Tagged console logger
 * Messages look like `[EVOLUTION] generation 3: 41 alive`.
 * Level comes from EDGE_SIM_LOG_LEVEL (debug | info | warn | error | silent), default info.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string, detail?: unknown) => void;
  info: (message: string, detail?: unknown) => void;
  warn: (message: string, detail?: unknown) => void;
  error: (message: string, detail?: unknown) => void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(raw: string | undefined = process.env.EDGE_SIM_LOG_LEVEL): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

export function createLogger(tag: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  const emit = (msgLevel: Exclude<LogLevel, "silent">, message: string, detail?: unknown) => {
    if (LEVEL_ORDER[msgLevel] < threshold) return;
    const line = `${prefix} ${message}`;
    const sink =
      msgLevel === "error" ? console.error :
      msgLevel === "warn" ? console.warn :
      msgLevel === "debug" ? console.debug :
      console.log;
    if (detail === undefined) {
      sink(line);
    } else {
      sink(line, detail);
    }
  };

  return {
    debug: (message, detail) => emit("debug", message, detail),
    info: (message, detail) => emit("info", message, detail),
    warn: (message, detail) => emit("warn", message, detail),
    error: (message, detail) => emit("error", message, detail),
  };
}
