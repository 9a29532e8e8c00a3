/**
 * Engine logger
 *
 * Console output always; a file transport is added when LOG_FILE is set.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = typeof mod === "string" ? ` [${mod}]` : "";
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(ts)} [${level}]${moduleTag}: ${String(message)}${metaStr}`;
  }
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  }),
];

if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      maxsize: 10_000_000,
      maxFiles: 5,
    })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports,
});

export type Logger = winston.Logger;

export function createModuleLogger(moduleName: string): Logger {
  return logger.child({ module: moduleName });
}
