import winston from "winston";
import { config } from "./config";

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(" ");
}

// Single-line output: "HH:mm:ss level: message key=value ..."
const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = formatMeta(meta);
    const text = metaStr ? `${String(message)} ${metaStr}` : String(message);
    return `${String(timestamp)} ${level}: ${text}`;
  })
);

export const logger = winston.createLogger({
  level: config.LOG_LEVEL === "silent" ? "error" : config.LOG_LEVEL,
  silent: config.LOG_LEVEL === "silent",
  format: lineFormat,
  transports: [new winston.transports.Console()],
  exitOnError: false,
});
