import pino, { type Level, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const satisfies readonly Level[];
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
    level?: LogLevel;
    /** Also append JSON lines to this file. */
    file?: string;
}

/**
 * Logs go to stderr: stdout carries the stdio transport's JSON-RPC frames.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const level = options.level ?? "info";
    const streams: pino.StreamEntry[] = [{ level, stream: pino.destination(2) }];
    if (options.file) {
        streams.push({ level, stream: pino.destination({ dest: options.file, mkdir: true, sync: false }) });
    }
    return pino({ name: "sandbox-mcp", level }, pino.multistream(streams));
}

export const silentLogger: Logger = pino({ level: "silent" });
