/**
 * Logger Configuration
 * Timestamps, service tags, HTTP context, errors and free-form metadata
 */

import winston from "winston";
import type { Request, Response } from "express";

// Custom log levels
const logLevels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

const logColors = {
    error: "red",
    warn: "yellow",
    info: "green",
    http: "magenta",
    debug: "cyan",
};

winston.addColors(logColors);

const RESERVED_KEYS = ["timestamp", "level", "message", "service", "port", "method", "url", "statusCode", "error"];

const isTest = process.env.NODE_ENV === "test";
const isProduction = process.env.NODE_ENV === "production";

const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        let text = `\n  Error: ${error.message}`;
        if (error.stack && process.env.NODE_ENV === "development") {
            text += `\n  Stack: ${error.stack}`;
        }
        return text;
    }
    return `\n  Error: ${JSON.stringify(error)}`;
};

// Console output: one header line, then error and meta
const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.colorize({ all: true }),
    winston.format.printf((info) => {
        const { timestamp, level, message, service, port, method, url, statusCode, error } = info;
        let logMessage = `[${String(timestamp)}]`;

        if (service) {
            logMessage += ` [${String(service)}]`;
        }
        if (port) {
            logMessage += ` [Port:${String(port)}]`;
        }
        if (method && url) {
            logMessage += ` [${String(method)} ${String(url)}]`;
        }
        if (statusCode) {
            logMessage += ` [Status:${String(statusCode)}]`;
        }

        logMessage += ` ${level}: ${String(message)}`;

        if (error) {
            logMessage += describeError(error);
        }

        const metaKeys = Object.keys(info).filter((key) => !RESERVED_KEYS.includes(key));
        if (metaKeys.length > 0) {
            logMessage += `\n  Meta: ${JSON.stringify(Object.fromEntries(metaKeys.map((k) => [k, info[k]])))}`;
        }

        return logMessage;
    })
);

const fileFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

const transportFormat = isProduction ? fileFormat : consoleFormat;

const logger = winston.createLogger({
    levels: logLevels,
    level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
    format: fileFormat,
    defaultMeta: {
        service: process.env.SERVICE_NAME || "learning-service",
        environment: process.env.NODE_ENV || "development",
    },
    transports: [new winston.transports.Console({ format: transportFormat, silent: isTest })],
    // Jest owns process-level handlers while tests run
    ...(isTest
        ? {}
        : {
              exceptionHandlers: [new winston.transports.Console({ format: transportFormat })],
              rejectionHandlers: [new winston.transports.Console({ format: transportFormat })],
          }),
});

/**
 * Log service startup
 */
export const logServiceStart = (serviceName: string, port: number): void => {
    logger.info(`${serviceName} started successfully`, {
        service: serviceName,
        port,
        timestamp: new Date().toISOString(),
    });
};

/**
 * Log service shutdown
 */
export const logServiceStop = (serviceName: string, port: number): void => {
    logger.info(`${serviceName} stopped`, {
        service: serviceName,
        port,
        timestamp: new Date().toISOString(),
    });
};

/**
 * Log API error
 * Client errors (4xx) are logged as warnings, server errors (5xx) as errors
 */
export const logApiError = (error: Error, req: Request, res: Response, statusCode: number = 500): void => {
    const logData = {
        requestId: res.getHeader("X-Request-ID"),
        method: req.method,
        url: req.originalUrl || req.url,
        statusCode,
        error: {
            name: error.name,
            message: error.message,
            stack: process.env.NODE_ENV === "development" ? error.stack : undefined,
        },
        ip: req.ip || req.socket.remoteAddress,
        userAgent: req.get("user-agent"),
    };

    if (statusCode >= 400 && statusCode < 500) {
        logger.warn(`API Error: ${error.message}`, logData);
    } else {
        logger.error(`API Error: ${error.message}`, logData);
    }
};

/**
 * Log database operation
 */
export const logDatabaseOperation = (
    operation: string,
    collection?: string,
    details: Record<string, unknown> = {}
): void => {
    logger.debug(`Database ${operation}`, {
        operation,
        collection,
        ...details,
    });
};

/**
 * Log performance metric
 */
export const logPerformance = (
    metric: string,
    value: number,
    unit: string = "ms",
    context: Record<string, unknown> = {}
): void => {
    logger.debug(`Performance: ${metric}`, {
        metric,
        value,
        unit,
        ...context,
    });
};

export default logger;
