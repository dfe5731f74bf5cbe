/**
 * Tagged console logger with an optional append-only file sink.
 *
 * Console output keeps the `[Tag] message` convention used across services.
 * File lines read `<ISO timestamp> - <LEVEL> - [Tag] message`.
 *
 * @module lib/logger
 */

import fs from "fs";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    /** Path of the append-only log file; null or omitted logs to the console only. */
    file?: string | null;
    /** Injected for tests */
    now?: () => Date;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
    const now = options.now ?? (() => new Date());
    const file = options.file ?? null;

    const write = (level: LogLevel, message: string) => {
        const line = `[${tag}] ${message}`;

        if (level === "ERROR") console.error(line);
        else if (level === "WARNING") console.warn(line);
        else console.log(line);

        if (file) {
            try {
                fs.appendFileSync(file, `${now().toISOString()} - ${level} - ${line}\n`, "utf8");
            } catch (error) {
                // Advisory only: a failed write never fails the call being logged.
                console.warn(`[Logger] Could not append to ${file}:`, error);
            }
        }
    };

    return {
        info: (message) => write("INFO", message),
        warn: (message) => write("WARNING", message),
        error: (message) => write("ERROR", message),
    };
}
