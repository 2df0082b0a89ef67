export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/**
 * Logger writing to stderr. stdout belongs to the stdio transport, so nothing
 * here may ever reach console.log.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (entryLevel: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) {
      return;
    }

    const line = `[${entryLevel}] ${message}`;
    if (fields && Object.keys(fields).length > 0) {
      console.error(line, fields);
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
