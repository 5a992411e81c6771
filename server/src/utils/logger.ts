/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON in production, silent under test.
 * Modules log through a named child so every line carries `module`.
 */
import pino from 'pino';
import type { Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function resolveLevel(): string {
    if (isTest) return 'silent';
    return process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');
}

// Create the logger instance
const logger: Logger = pino({
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
    ...(isDev
        ? {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        }
        : {}),
});

// Create child loggers for different modules
export const erpLogger: Logger = logger.child({ module: 'erp' });
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const hookLogger: Logger = logger.child({ module: 'hooks' });
export const reconciliationLogger: Logger = logger.child({ module: 'reconciliation' });
export const cashLogger: Logger = logger.child({ module: 'cash' });
export const authLogger: Logger = logger.child({ module: 'auth' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            logger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            logger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            logger.warn(logData, 'Slow request');
        } else {
            logger.debug(logData, 'Request completed');
        }
    });

    next();
}
