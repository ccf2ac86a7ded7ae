import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
    level?: string;
    logDir?: string;
    fileName?: string;
}

const LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

export function resolveLevel(value: string | undefined): pino.Level {
    return LEVELS.find(level => level === value) ?? "info";
}

/**
 * JSON lines to stdout and to a file under the log directory.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
    const logDir = opts.logDir ?? process.env.LOG_DIR ?? path.resolve(process.cwd(), "logs");
    fs.mkdirSync(logDir, { recursive: true });

    const level = resolveLevel(opts.level ?? process.env.LOG_LEVEL);
    const destination = pino.destination({
        dest: path.join(logDir, opts.fileName ?? "maker.log"),
        sync: false
    });

    return pino(
        {
            level,
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime
        },
        pino.multistream([
            { level, stream: process.stdout },
            { level, stream: destination }
        ])
    );
}

export function createSilentLogger(): Logger {
    return pino({ level: "silent" });
}
