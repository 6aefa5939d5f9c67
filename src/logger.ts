/**
 * Structured logging on top of winston. Each module asks for a namespaced
 * logger; the namespace and any bound context travel with every entry.
 */

import winston from "winston";
import { readLogSettings, type LogSettings } from "./config";

export type LogContext = Record<string, unknown>;

const structuredFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr}`;
  })
);

function buildWinstonLogger({ level, nodeEnv }: LogSettings): winston.Logger {
  return winston.createLogger({
    level,
    transports: [
      new winston.transports.Console({
        format: nodeEnv === "production" ? structuredFormat : consoleFormat,
      }),
    ],
    exitOnError: false,
  });
}

// Built on first use so importing the engine never reads the environment.
let winstonLogger: winston.Logger | null = null;

function baseLogger(): winston.Logger {
  if (!winstonLogger) {
    winstonLogger = buildWinstonLogger(readLogSettings());
  }
  return winstonLogger;
}

/** Replaces the shared transport settings, e.g. once the full config is validated. */
export function configureLogging(settings: LogSettings): void {
  winstonLogger?.close();
  winstonLogger = buildWinstonLogger(settings);
}

export function getLogLevel(): string {
  return baseLogger().level;
}

export class Logger {
  private readonly namespace: string;
  private readonly context: LogContext;

  constructor(namespace: string, context: LogContext = {}) {
    this.namespace = namespace;
    this.context = context;
  }

  getNamespace(): string {
    return this.namespace;
  }

  private merge(extra?: LogContext): LogContext {
    return { namespace: this.namespace, ...this.context, ...extra };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      baseLogger().error(message, {
        ...this.merge(context),
        error: { name: error.name, message: error.message, stack: error.stack },
      });
    } else if (error !== undefined) {
      baseLogger().error(message, { ...this.merge(context), error });
    } else {
      baseLogger().error(message, this.merge(context));
    }
  }

  warn(message: string, context?: LogContext): void {
    baseLogger().warn(message, this.merge(context));
  }

  info(message: string, context?: LogContext): void {
    baseLogger().info(message, this.merge(context));
  }

  debug(message: string, context?: LogContext): void {
    baseLogger().debug(message, this.merge(context));
  }

  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context });
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}
