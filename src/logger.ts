/**
 * logger.ts — Structured, level-aware console logger.
 * Timestamps every line. Never logs secrets.
 *
 * Extra sinks (telemetry.ts) can be attached at startup; they receive every
 * record that passes the level gate.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: LogLevel, message: string, meta?: unknown) => void;

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

const sinks: LogSink[] = [];

function shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[config.LOG_LEVEL];
}

function format(level: LogLevel, message: string, meta?: unknown): string {
    const ts = new Date().toISOString();
    const color = COLORS[level];
    const label = level.toUpperCase().padEnd(5);
    const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : "";
    return `${color}[${ts}] ${label}${RESET} ${message}${metaStr}`;
}

function emit(level: LogLevel, message: string, meta?: unknown): void {
    for (const sink of sinks) {
        try {
            sink(level, message, meta);
        } catch (err) {
            console.error(format("error", "Log sink failed", { err: String(err) }));
        }
    }
}

/** Attach a sink; returns a function that detaches it again */
export function addLogSink(sink: LogSink): () => void {
    sinks.push(sink);
    return () => {
        const idx = sinks.indexOf(sink);
        if (idx >= 0) sinks.splice(idx, 1);
    };
}

export const logger = {
    debug(message: string, meta?: unknown) {
        if (!shouldLog("debug")) return;
        console.debug(format("debug", message, meta));
        emit("debug", message, meta);
    },
    info(message: string, meta?: unknown) {
        if (!shouldLog("info")) return;
        console.info(format("info", message, meta));
        emit("info", message, meta);
    },
    warn(message: string, meta?: unknown) {
        if (!shouldLog("warn")) return;
        console.warn(format("warn", message, meta));
        emit("warn", message, meta);
    },
    error(message: string, meta?: unknown) {
        if (!shouldLog("error")) return;
        console.error(format("error", message, meta));
        emit("error", message, meta);
    },
};
