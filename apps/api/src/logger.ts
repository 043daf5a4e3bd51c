import pino from "pino";

// Fields that may carry credentials in request logs or error contexts.
export const REDACT_PATHS = [
  "req.headers.authorization",
  "headers.authorization",
  "apiKey",
  "*.apiKey",
  "token",
  "*.token",
];

export type LoggerOptions = {
  level?: string;
  destination?: pino.DestinationStream;
};

function defaultLevel() {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === "test") return "silent";
  return "info";
}

/** Structured JSON logger shared by the server and the round pipeline. */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const settings: pino.LoggerOptions = {
    name,
    level: options.level ?? defaultLevel(),
    redact: REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}
