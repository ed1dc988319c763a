import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import path from "path";
import { randomUUID } from "crypto";
import { Request } from "express";

type LogData = Record<string, unknown>;

const isTest = process.env.NODE_ENV === "test";
const isProduction = process.env.NODE_ENV === "production";

const LOG_DIR = process.env.LOG_DIR || "logs";
const LOG_TO_FILE = process.env.LOG_TO_FILE
  ? process.env.LOG_TO_FILE === "true"
  : !isTest;

// Define custom colors for each log level
const customColors = {
  error: "red",
  warn: "yellow",
  info: "cyan",
  debug: "magenta",
};

winston.addColors(customColors);

const devConsoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

function fileTransports(): DailyRotateFile[] {
  if (!LOG_TO_FILE) return [];
  return [
    new DailyRotateFile({
      filename: path.join(LOG_DIR, "app-%DATE%.log"),
      datePattern: "YYYY-MM-DD",
      maxSize: "20m",
      maxFiles: "14d",
      level: "debug",
      format: fileFormat,
    }),

    new DailyRotateFile({
      filename: path.join(LOG_DIR, "error-%DATE%.log"),
      datePattern: "YYYY-MM-DD",
      maxSize: "20m",
      maxFiles: "30d",
      level: "error",
      format: fileFormat,
    }),
  ];
}

function formatMessage(message: string, data?: LogData): string {
  return data ? `${message} ${JSON.stringify(data)}` : message;
}

class Logger {
  private logger: winston.Logger;

  constructor() {
    this.logger = winston.createLogger({
      level: "debug",
      transports: [
        ...fileTransports(),

        new winston.transports.Console({
          level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
          format: devConsoleFormat,
          silent: isTest,
        }),
      ],
    });
  }

  debug(message: string, data?: LogData) {
    this.logger.debug(formatMessage(message, data));
  }

  info(message: string, data?: LogData) {
    this.logger.info(formatMessage(message, data));
  }

  warn(message: string, data?: LogData) {
    this.logger.warn(formatMessage(message, data));
  }

  error(message: string, data?: LogData) {
    this.logger.error(formatMessage(message, data));
  }

  getRequestId(req: Request): string {
    const header = req.headers["x-request-id"] ?? req.headers["request-id"];
    const value = Array.isArray(header) ? header[0] : header;
    return value || randomUUID().slice(0, 8);
  }
}

const logger = new Logger();
export default logger;

export type { LogData };
