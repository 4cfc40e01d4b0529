export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type Meta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  child(scope: string): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

function format(scope: string, message: string, meta?: Meta): string {
  const line = `[${scope}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) {
    return line;
  }
  return `${line} ${JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  )}`;
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const enabled = (target: Exclude<LogLevel, "silent">) => LEVEL_PRIORITY[target] >= LEVEL_PRIORITY[level];

  return {
    debug(message, meta) {
      if (enabled("debug")) console.debug(format(scope, message, meta));
    },
    info(message, meta) {
      if (enabled("info")) console.info(format(scope, message, meta));
    },
    warn(message, meta) {
      if (enabled("warn")) console.warn(format(scope, message, meta));
    },
    error(message, meta) {
      if (enabled("error")) console.error(format(scope, message, meta));
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    }
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
