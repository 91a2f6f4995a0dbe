/**
 * Structured logging for the matcher.
 * Keeps a bounded in-memory history so a pass can be dumped to disk for review.
 */

import fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: LogContext;
    stack?: string;
}

class Logger {
    private logs: LogEntry[] = [];
    private maxLogs = 1000;

    private isDevelopment(): boolean {
        return process.env.NODE_ENV !== 'production';
    }

    private log(level: LogLevel, message: string, context?: LogContext, error?: Error) {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            context,
            stack: error?.stack
        };

        this.logs.push(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.shift();
        }

        const tag = `[${level.toUpperCase()}]`;
        const args: unknown[] = context ? [tag, message, context] : [tag, message];

        if (level === 'error') console.error(...args);
        else if (level === 'warn') console.warn(...args);
        else console.log(...args);

        if (error?.stack && this.isDevelopment()) console.error(error.stack);
    }

    debug(message: string, context?: LogContext) {
        if (this.isDevelopment()) this.log('debug', message, context);
    }

    info(message: string, context?: LogContext) {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext) {
        this.log('warn', message, context);
    }

    error(message: string, contextOrError?: LogContext | Error) {
        const isError = contextOrError instanceof Error;
        this.log('error', message, isError ? { error: contextOrError.message } : contextOrError, isError ? contextOrError : undefined);
    }

    getLogs(): LogEntry[] {
        return [...this.logs];
    }

    getLogsByLevel(level: LogLevel): LogEntry[] {
        return this.logs.filter(log => log.level === level);
    }

    exportLogs(filePath = `matcher-logs-${new Date().toISOString().split('T')[0]}.json`): string {
        fs.writeFileSync(filePath, JSON.stringify(this.logs, null, 2), 'utf-8');
        return filePath;
    }

    clear() {
        this.logs = [];
    }
}

export const logger = new Logger();
