// Structured logging utility
import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_WEIGHTS;
}

function thresholdFromEnv(): LogLevel {
    const value = (process.env.LOG_LEVEL || '').toLowerCase();
    return isLogLevel(value) ? value : 'info';
}

let threshold: LogLevel = thresholdFromEnv();
let logFile: string | null = process.env.LOG_FILE || null;

export function configureLogging(options: { level?: LogLevel; file?: string | null }): void {
    if (options.level) threshold = options.level;
    if (options.file !== undefined) logFile = options.file;
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[threshold]) return;

    const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        context
    };

    const payload = JSON.stringify(entry);
    if (level === 'error') {
        console.error(payload);
    } else if (level === 'warn') {
        console.warn(payload);
    } else {
        console.log(payload);
    }

    if (logFile) {
        try {
            const line = `${entry.timestamp} [${level.toUpperCase()}] ${message}${context ? ' ' + JSON.stringify(context) : ''}\n`;
            fs.appendFileSync(logFile, line);
        } catch {
            // The console line above already carries the entry
        }
    }
}
