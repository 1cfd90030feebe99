/**
 * Structured logging for the evolution coordinator.
 *
 * Redaction policy:
 * - Provider credentials never reach the log stream
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "skill-evolution",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      // Add `error` so logger.error({ error: someError }) shows message + stack.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "apiKey",
        "api_key",
        "password",
        "token",
        "*.apiKey",
        "*.api_key",
        "llm.api_key",
      ],
      censor: "[REDACTED]",
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;
