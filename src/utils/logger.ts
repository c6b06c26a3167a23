/**
 * Stderr logger.
 *
 * Library output must never land on stdout, which belongs to the host
 * process (a converter may be streaming a PDF there).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const PREFIX = '[docx-resources]';

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export function isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function logToStderr(level: LogLevel, message: string): void {
    if (!isLevelEnabled(level)) return;
    process.stderr.write(`${PREFIX} [${level.toUpperCase()}] ${message}\n`);
}

