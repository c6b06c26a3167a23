/**
 * Diagnostics sink injected into the resolvers.
 *
 * Resolution functions report what they skipped or degraded here instead of
 * calling the logger, so they stay free of global side effects under test.
 */

import { logToStderr, type LogLevel } from '../utils/logger.js';

export interface Diagnostics {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
}

function formatContext(context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) return '';
    return ` ${JSON.stringify(context)}`;
}

/** Diagnostics forwarded to the stderr logger, tagged with a scope name. */
export function createLoggerDiagnostics(scope: string): Diagnostics {
    const emit = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
        logToStderr(level, `${scope}: ${message}${formatContext(context)}`);
    return {
        debug: emit('debug'),
        info: emit('info'),
        warn: emit('warn'),
        error: emit('error'),
    };
}

export const silentDiagnostics: Diagnostics = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};
