// Agent Logger
// Scoped console logging with an append-only, timestamped log file

import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggingOptions {
    level?: LogLevel;
    /** Absolute path of the log file; omitted means console only */
    file?: string;
}

let minLevel: LogLevel = 'info';
let fileStream: WriteStream | null = null;

/**
 * Set the level filter and (re)open the log file in append mode
 */
export function configureLogging(options: LoggingOptions): void {
    minLevel = options.level ?? minLevel;

    if (fileStream) {
        fileStream.end();
        fileStream = null;
    }

    if (options.file) {
        mkdirSync(dirname(options.file), { recursive: true });
        const stream = createWriteStream(options.file, { flags: 'a' });
        stream.on('error', (error) => {
            console.error(`[logger] Log file error: ${error.message}`);
            if (fileStream === stream) {
                fileStream = null;
            }
        });
        fileStream = stream;
    }
}

/**
 * Flush and close the log file
 */
export function closeLogging(): Promise<void> {
    const stream = fileStream;
    fileStream = null;
    if (!stream) {
        return Promise.resolve();
    }
    return new Promise((resolve) => {
        stream.end(() => resolve());
    });
}

function write(level: LogLevel, scope: string, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
        return;
    }

    const line = `[${scope}] ${message}`;
    switch (level) {
        case 'debug':
            console.debug(line);
            break;
        case 'info':
            console.log(line);
            break;
        case 'warn':
            console.warn(line);
            break;
        case 'error':
            console.error(line);
            break;
    }

    fileStream?.write(`${new Date().toISOString()} ${level.toUpperCase()} ${line}\n`);
}

export function createLogger(scope: string): Logger {
    return {
        debug: (message) => write('debug', scope, message),
        info: (message) => write('info', scope, message),
        warn: (message) => write('warn', scope, message),
        error: (message) => write('error', scope, message),
    };
}
