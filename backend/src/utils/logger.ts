/**
 * Structured Logging
 * Context-aware console logging with levels, request tracking, and optional JSON file output
 */

import { createWriteStream, existsSync, mkdirSync } from 'fs';
import { join } from 'path';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    CRITICAL = 4,
    SILENT = 5
}

export type LogContext = Record<string, unknown>;

interface LogEntry {
    timestamp: string;
    level: string;
    requestId?: string;
    message: string;
    context?: LogContext;
    error?: {
        message: string;
        stack?: string;
        code?: string;
    };
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Directory for the daily JSON-lines file; null disables file output. */
    logDir?: string | null;
}

export interface ChildLogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: unknown, context?: LogContext): void;
    critical(message: string, error?: unknown, context?: LogContext): void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
    switch (value?.toLowerCase()) {
        case 'debug': return LogLevel.DEBUG;
        case 'warn': return LogLevel.WARN;
        case 'error': return LogLevel.ERROR;
        case 'silent': return LogLevel.SILENT;
        default: return LogLevel.INFO;
    }
}

function describeError(error: unknown): LogEntry['error'] {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return { message: error.message, stack: error.stack, code };
    }
    return { message: String(error) };
}

export class Logger {
    private logLevel: LogLevel;
    private logStream?: ReturnType<typeof createWriteStream>;

    constructor(options: LoggerOptions = {}) {
        this.logLevel = options.level ?? LogLevel.INFO;
        if (options.logDir) {
            this.initializeLogFile(options.logDir);
        }
    }

    private initializeLogFile(logDir: string) {
        try {
            if (!existsSync(logDir)) {
                mkdirSync(logDir, { recursive: true });
            }

            const logFile = join(logDir, `sitesmith-${this.getDateString()}.log`);
            this.logStream = createWriteStream(logFile, { flags: 'a' });

            this.logStream.on('error', (err) => {
                console.error('Log stream error:', err);
            });
        } catch (error) {
            console.error('Failed to initialize log file:', error);
        }
    }

    private getDateString(): string {
        const date = new Date();
        return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`;
    }

    private writeLog(entry: LogEntry) {
        const colors: Record<string, string> = {
            DEBUG: '\x1b[36m',
            INFO: '\x1b[32m',
            WARN: '\x1b[33m',
            ERROR: '\x1b[31m',
            CRITICAL: '\x1b[35m'
        };

        const reset = '\x1b[0m';
        const color = colors[entry.level] || '';

        console.log(`${color}[${entry.timestamp}] [${entry.level}]${entry.requestId ? ` [${entry.requestId}]` : ''} ${entry.message}${reset}`);

        if (entry.context) {
            console.log(`${color}  Context:${reset}`, entry.context);
        }

        if (entry.error) {
            console.error(`${color}  Error:${reset}`, entry.error);
        }

        if (this.logStream) {
            this.logStream.write(JSON.stringify(entry) + '\n');
        }
    }

    private log(level: LogLevel, name: string, message: string, context?: LogContext, requestId?: string, error?: unknown) {
        if (this.logLevel > level) return;
        this.writeLog({
            timestamp: new Date().toISOString(),
            level: name,
            requestId,
            message,
            context,
            error: describeError(error)
        });
    }

    debug(message: string, context?: LogContext, requestId?: string) {
        this.log(LogLevel.DEBUG, 'DEBUG', message, context, requestId);
    }

    info(message: string, context?: LogContext, requestId?: string) {
        this.log(LogLevel.INFO, 'INFO', message, context, requestId);
    }

    warn(message: string, context?: LogContext, requestId?: string) {
        this.log(LogLevel.WARN, 'WARN', message, context, requestId);
    }

    error(message: string, error?: unknown, context?: LogContext, requestId?: string) {
        this.log(LogLevel.ERROR, 'ERROR', message, context, requestId, error);
    }

    critical(message: string, error?: unknown, context?: LogContext, requestId?: string) {
        this.log(LogLevel.CRITICAL, 'CRITICAL', message, context, requestId, error);
    }

    // Request-scoped logger
    child(requestId: string): ChildLogger {
        return {
            debug: (msg, ctx) => this.debug(msg, ctx, requestId),
            info: (msg, ctx) => this.info(msg, ctx, requestId),
            warn: (msg, ctx) => this.warn(msg, ctx, requestId),
            error: (msg, err, ctx) => this.error(msg, err, ctx, requestId),
            critical: (msg, err, ctx) => this.critical(msg, err, ctx, requestId)
        };
    }
}

// Singleton instance
const logger = new Logger({
    level: parseLogLevel(process.env.LOG_LEVEL),
    logDir: process.env.LOG_DIR === undefined ? join(process.cwd(), 'logs') : process.env.LOG_DIR || null
});

export default logger;
