export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(stage: string, message: string, data?: unknown): void;
  info(stage: string, message: string, data?: unknown): void;
  warn(stage: string, message: string, data?: unknown): void;
  error(stage: string, message: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function ts(): string {
  return new Date().toISOString();
}

export function createLogger(level: LogLevel = "info"): Logger {
  const write = (at: LogLevel) => (stage: string, message: string, data?: unknown) => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    const line = `[${ts()}][persona-card][${at.toUpperCase()}][${stage}] ${message}`;
    if (data === undefined) {
      SINKS[at](line);
    } else {
      SINKS[at](line, data);
    }
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/** Logger that drops everything; handy for library callers and tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
