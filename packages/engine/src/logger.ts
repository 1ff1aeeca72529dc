// ─── Logger ────────────────────────────────────────────────────────
// Process-wide winston logger. JSON with timestamps for machines, a
// colorized one-liner on the console. LOG_LEVEL=silent mutes it (the
// test config sets this).

import winston from "winston";

const serializeError = (error: unknown): unknown => {
  if (!(error instanceof Error)) {
    return error;
  }
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  for (const [key, value] of Object.entries(error)) {
    serialized[key] = value;
  }
  return serialized;
};

const splatSymbol = Symbol.for("splat");

const normalizeErrorsFormat = winston.format((info) => {
  const splat = info[splatSymbol];
  if (Array.isArray(splat)) {
    const errors = splat.filter((item) => item instanceof Error);
    if (errors.length > 0 && !info.error) {
      info.error = serializeError(errors[0]);
    }
  }
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  }
  return info;
});

const level = process.env.LOG_LEVEL ?? "info";

export const logger = winston.createLogger({
  level: level === "silent" ? "error" : level,
  silent: level === "silent",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    normalizeErrorsFormat(),
    winston.format.json()
  ),
  defaultMeta: { service: "jester-engine" },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} [${level}]: ${String(message)}${details}`;
        })
      ),
    }),
  ],
});
