/**
 * logger.ts — Structured, level-aware logger.
 * Timestamps every line and writes to stderr: stdout belongs to the console
 * and, in the document server, to the stdio protocol. Never logs secrets.
 */

import { logLevelSchema } from "./config.js";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const COLORS: Record<LogLevel, string> = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m",  // cyan
    warn: "\x1b[33m",  // yellow
    error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

const initial = logLevelSchema.safeParse(process.env.LOG_LEVEL);
let threshold: LogLevel = initial.success ? initial.data : "info";

function shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[threshold];
}

function format(level: LogLevel, message: string, meta?: unknown): string {
    const ts = new Date().toISOString();
    const color = COLORS[level];
    const label = level.toUpperCase().padEnd(5);
    const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : "";
    return `${color}[${ts}] ${label}${RESET} ${message}${metaStr}\n`;
}

function write(level: LogLevel, message: string, meta?: unknown) {
    if (shouldLog(level)) process.stderr.write(format(level, message, meta));
}

export const logger = {
    setLevel(level: LogLevel) {
        threshold = level;
    },
    debug(message: string, meta?: unknown) {
        write("debug", message, meta);
    },
    info(message: string, meta?: unknown) {
        write("info", message, meta);
    },
    warn(message: string, meta?: unknown) {
        write("warn", message, meta);
    },
    error(message: string, meta?: unknown) {
        write("error", message, meta);
    },
};
