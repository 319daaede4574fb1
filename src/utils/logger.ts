import winston, { format } from "winston";
import config from "../config";

const SENSITIVE_KEYS = [/token/i, /authorization/i, /secret/i, /password/i];
const REDACTED = "[REDACTED]";

function isSensitive(key: string): boolean {
  return SENSITIVE_KEYS.some((pattern) => pattern.test(key));
}

function redact(value: unknown): unknown {
  if (value instanceof Error) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value !== null && typeof value === "object") {
    const copy: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      copy[key] = isSensitive(key) ? REDACTED : redact(nested);
    }
    return copy;
  }
  return value;
}

/**
 * Masks access tokens and auth headers in log metadata.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (key === "level" || key === "message") {
      continue;
    }
    info[key] = isSensitive(key) ? REDACTED : redact(info[key]);
  }
  return info;
});

const pretty = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...rest } = info;
    const context = Object.entries(rest)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${context ? ` ${context}` : ""}`;
    return typeof stack === "string" ? `${line}\n${stack}` : line;
  }),
);

const logger = winston.createLogger({
  level: config.logging.level,
  format: format.combine(
    redactSecrets(),
    format.timestamp(),
    format.errors({ stack: true }),
    config.env === "production" ? format.json() : pretty,
  ),
  transports: [new winston.transports.Console()],
  silent: config.env === "test",
  exitOnError: false,
});

export default logger;
