import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'fs';
import { join } from 'path';
import { env } from '../config/env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

/**
 * One line of events.jsonl
 */
export interface LogEvent {
    timestamp: string;
    type: string;
    level: LogLevel;
    payload: unknown;
}

export interface EventLogOptions {
    level: LogLevel;
    toFile: boolean;
    dir: string;
    maxFileBytes?: number;
    maxBackups?: number;
    write?: (line: string, payload: unknown) => void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    critical: 4,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: '\x1b[36m',
    info: '\x1b[32m',
    warn: '\x1b[33m',
    error: '\x1b[31m',
    critical: '\x1b[41m',
};
const RESET = '\x1b[0m';

export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_MAX_BACKUPS = 5;

export function formatConsoleHeader(event: LogEvent): string {
    return `${LEVEL_COLORS[event.level]}[${event.timestamp}] [${event.level.toUpperCase()}] [${event.type}]${RESET}`;
}

/**
 * events.jsonl -> events.jsonl.1 -> ... -> events.jsonl.N, oldest dropped
 */
function rotate(file: string, maxBackups: number): void {
    const oldest = `${file}.${maxBackups}`;
    if (existsSync(oldest)) {
        rmSync(oldest);
    }
    for (let i = maxBackups - 1; i >= 1; i--) {
        if (existsSync(`${file}.${i}`)) {
            renameSync(`${file}.${i}`, `${file}.${i + 1}`);
        }
    }
    if (maxBackups > 0) {
        renameSync(file, `${file}.1`);
    } else {
        rmSync(file);
    }
}

export type EventLog = ReturnType<typeof createEventLog>;

/**
 * Structured event logger: colored console line plus optional JSONL file
 * with size-based rotation. Event types are dotted, e.g. `feed.ws.connected`.
 */
export function createEventLog(options: EventLogOptions) {
    const file = join(options.dir, 'events.jsonl');
    const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
    const maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    const write = options.write ?? ((line: string, payload: unknown) => {
        console.log(line, typeof payload === 'object' ? JSON.stringify(payload, null, 2) : payload);
    });

    if (options.toFile && !existsSync(options.dir)) {
        mkdirSync(options.dir, { recursive: true });
    }

    const appendToFile = (event: LogEvent) => {
        try {
            if (existsSync(file) && statSync(file).size >= maxFileBytes) {
                rotate(file, maxBackups);
            }
            appendFileSync(file, JSON.stringify(event) + '\n', 'utf-8');
        } catch (error) {
            console.error('Failed to write to log file:', error);
        }
    };

    const emit = (type: string, payload: unknown, level: LogLevel) => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[options.level]) {
            return;
        }

        const event: LogEvent = {
            timestamp: new Date().toISOString(),
            type,
            level,
            payload,
        };

        write(formatConsoleHeader(event), payload);

        if (options.toFile) {
            appendToFile(event);
        }
    };

    return {
        file,
        debug: (type: string, payload: unknown) => emit(type, payload, 'debug'),
        info: (type: string, payload: unknown) => emit(type, payload, 'info'),
        warn: (type: string, payload: unknown) => emit(type, payload, 'warn'),
        error: (type: string, payload: unknown) => emit(type, payload, 'error'),
        critical: (type: string, payload: unknown) => emit(type, payload, 'critical'),
    };
}

/**
 * Flatten an unknown thrown value into log payload fields
 */
export function errorFields(error: unknown): { error: string; stack?: string } {
    return error instanceof Error
        ? { error: error.message, stack: error.stack }
        : { error: String(error) };
}

export const logger = createEventLog({
    level: env.LOG_LEVEL,
    toFile: env.LOG_TO_FILE,
    dir: env.LOG_DIR,
});
