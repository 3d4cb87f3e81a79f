import { appConfig, type LogLevel } from "../config/appConfig";

export type Logger = {
  debug: (message: string, details?: Record<string, unknown>) => void;
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

type WritableLevel = Exclude<LogLevel, "silent">;

export function createLogger(scope: string, level: LogLevel = appConfig.logLevel): Logger {
  const write = (messageLevel: WritableLevel, message: string, details?: Record<string, unknown>) => {
    if (LEVEL_RANK[messageLevel] < LEVEL_RANK[level]) return;
    const line = `[${scope}] ${message}`;
    const args: unknown[] = details ? [line, details] : [line];
    switch (messageLevel) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details)
  };
}
