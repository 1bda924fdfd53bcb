/**
 * Structured logger using Winston.
 * Tags all messages with the emitting component.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = component ? `[${String(component)}]` : "[app]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level} ${tag} ${String(message)}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
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

/** Create a child logger tagged with a component name */
export function componentLogger(component: string) {
  return logger.child({ component });
}
