import winston from "winston";

// Everything goes to stderr: stdout carries CLI output and the MCP stdio stream.
const logger = winston.createLogger({
  level: process.env.BULBS_LOG_LEVEL || "warn",
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true })),
  defaultMeta: { service: "bulbs" },
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

/** The TUI owns the terminal, so console logging is muted while it runs. */
export function setSilent(silent: boolean): void {
  logger.silent = silent;
}

export default logger;
