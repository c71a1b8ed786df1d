export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  readonly level: LogLevel;
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (scope: string) => Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(value: unknown, fallback: LogLevel): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value;
  }
  return fallback;
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    parts.push(`${key}=${typeof value === "number" && !Number.isInteger(value) ? value.toFixed(3) : String(value)}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createLogger(scope: string, level: LogLevel = "warn"): Logger {
  const threshold = LEVEL_RANK[level];
  const line = (message: string, fields: LogFields | undefined): string => `[${scope}] ${message}${formatFields(fields)}`;
  return {
    level,
    debug: (message, fields) => {
      if (threshold <= LEVEL_RANK.debug) {
        // eslint-disable-next-line no-console
        console.log(line(message, fields));
      }
    },
    info: (message, fields) => {
      if (threshold <= LEVEL_RANK.info) {
        // eslint-disable-next-line no-console
        console.log(line(message, fields));
      }
    },
    warn: (message, fields) => {
      if (threshold <= LEVEL_RANK.warn) {
        // eslint-disable-next-line no-console
        console.warn(line(message, fields));
      }
    },
    error: (message, fields) => {
      if (threshold <= LEVEL_RANK.error) {
        // eslint-disable-next-line no-console
        console.error(line(message, fields));
      }
    },
    child: (childScope) => createLogger(`${scope} ${childScope}`, level),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
