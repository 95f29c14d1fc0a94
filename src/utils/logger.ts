type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.FACEPRINT_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

// Longer numeric arrays (embeddings, centroids) are logged by length only
const MAX_LOGGED_NUMBERS = 8;

function summarizeVectors(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return `[${value.length} bytes]`;
  }
  if (
    Array.isArray(value) &&
    value.length > MAX_LOGGED_NUMBERS &&
    value.every((item: unknown) => typeof item === "number")
  ) {
    return `[${value.length} numbers]`;
  }
  return value;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function formatMessage(level: LogLevel, component: string, message: string, data?: unknown): string {
  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const componentStr = component.padEnd(10);

  let output = `[${timestamp}] ${levelStr} [${componentStr}] ${message}`;

  if (data !== undefined) {
    output += `\n${JSON.stringify(data, summarizeVectors, 2)}`;
  }

  return output;
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(component: string) {
  return {
    debug(message: string, data?: unknown) {
      if (shouldLog("debug")) {
        console.debug(formatMessage("debug", component, message, data));
      }
    },

    info(message: string, data?: unknown) {
      if (shouldLog("info")) {
        console.info(formatMessage("info", component, message, data));
      }
    },

    warn(message: string, data?: unknown) {
      if (shouldLog("warn")) {
        console.warn(formatMessage("warn", component, message, data));
      }
    },

    error(message: string, data?: unknown) {
      if (shouldLog("error")) {
        console.error(formatMessage("error", component, message, data));
      }
    },
  };
}

// Pre-configured loggers for main components
export const embeddingLogger = createLogger("embedding");
export const imageLogger = createLogger("image");
export const matchingLogger = createLogger("matching");
export const peopleLogger = createLogger("people");
