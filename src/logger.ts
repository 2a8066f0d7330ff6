import pino, { type LoggerOptions } from "pino";

/**
 * Structured logger shape shared by engine components. Both pino and the
 * Fastify request/app loggers satisfy it.
 */
export type EngineLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

const isDev = process.env.NODE_ENV !== "production";

export function buildLoggerOptions(level?: string): LoggerOptions {
  const resolvedLevel =
    level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info");

  return {
    level: resolvedLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  };
}

export function createLogger(level?: string): pino.Logger {
  return pino(buildLoggerOptions(level));
}

export const silentLogger: EngineLogger = pino({ level: "silent" });
