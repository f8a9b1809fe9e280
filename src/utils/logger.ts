/**
 * Structured logger using Winston.
 * Every line carries the emitting component; Error values in metadata are
 * written as name and message rather than the `{}` JSON.stringify gives them.
 */

import winston from "winston";
import { config } from "../config/index.js";

const { combine, timestamp, printf, colorize, errors } = winston.format;

function serializeMeta(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export interface LogLine {
  level: string;
  message: unknown;
  timestamp?: unknown;
  component?: unknown;
  [key: string]: unknown;
}

export function formatLogLine({ level, message, timestamp, component, ...meta }: LogLine): string {
  const tag = typeof component === "string" ? `[${component}]` : "[system]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, serializeMeta)}` : "";
  return `${String(timestamp)} ${level} ${tag} ${String(message)}${metaStr}`;
}

const logFormat = printf((info) => formatLogLine(info));

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Child logger tagged with a component name */
export function componentLogger(component: string) {
  return logger.child({ component });
}
