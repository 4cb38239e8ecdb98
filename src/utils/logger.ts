import process from 'node:process';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    minimumLevel = level;
}

/**
 * Write a log line to stderr.
 * stdout belongs to the MCP stdio transport and must only carry JSON-RPC.
 */
export function logToStderr(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
    process.stderr.write(`[odt-meta] [${level}] ${message}\n`);
}

export const logger = {
    debug: (message: string) => logToStderr('debug', message),
    info: (message: string) => logToStderr('info', message),
    warning: (message: string) => logToStderr('warning', message),
    error: (message: string) => logToStderr('error', message),
};
