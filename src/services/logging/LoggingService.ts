import winston from "winston";
import { join } from "path";
import type { CoachError } from "../../utils/error";

const { combine, timestamp, printf, colorize } = winston.format;

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const scope = typeof component === "string" ? ` [${component}]` : "";
  const metaString = Object.keys(metadata).length
    ? ` | ${JSON.stringify(metadata)}`
    : "";

  return `${timestamp} ${level}${scope}: ${message}${metaString}`;
});

export class LoggingService {
  private static instance: LoggingService;
  private logger: winston.Logger;
  private isDevelopment: boolean;

  private constructor() {
    this.isDevelopment = process.env.NODE_ENV !== "production";

    const transports: Array<
      | winston.transports.ConsoleTransportInstance
      | winston.transports.FileTransportInstance
    > = [
      new winston.transports.Console({
        format: combine(timestamp(), colorize(), logFormat),
      }),
    ];

    const logDir = process.env.LOG_DIR;
    if (logDir) {
      transports.push(
        new winston.transports.File({
          filename: join(logDir, "error.log"),
          level: "error",
          format: combine(timestamp(), logFormat),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        new winston.transports.File({
          filename: join(logDir, "combined.log"),
          format: combine(timestamp(), logFormat),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        })
      );
    }

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || (this.isDevelopment ? "debug" : "info"),
      silent: process.env.NODE_ENV === "test",
      transports,
    });
  }

  static getInstance(): LoggingService {
    if (!LoggingService.instance) {
      LoggingService.instance = new LoggingService();
    }
    return LoggingService.instance;
  }

  log(
    level: LogLevel,
    message: string,
    component?: string,
    metadata?: Record<string, unknown>
  ): void {
    this.logger.log({
      level,
      message,
      component,
      ...(this.isDevelopment ? metadata : undefined),
    });
  }

  error(error: CoachError, component?: string): void {
    this.log(LogLevel.ERROR, error.message, component ?? error.metadata.component, {
      code: error.code,
      severity: error.severity,
      ...error.metadata,
    });
  }
}
