/**
 * Minimal leveled logger over `console`. Conversions log guard cut-offs and
 * failures through it; the level comes from the converter configuration.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

type ConsoleLevel = Exclude<LogLevel, "silent">;

export function createLogger(level: LogLevel = "warn", prefix: string = "[struct-json]"): Logger {
    const emit = (at: ConsoleLevel, message: string, meta?: LogMeta) => {
        if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
        const text = `${prefix} ${message}`;
        const payload = meta ? [text, meta] : [text];
        console[at](...payload);
    };
    return {
        debug: (m, meta) => emit("debug", m, meta),
        info: (m, meta) => emit("info", m, meta),
        warn: (m, meta) => emit("warn", m, meta),
        error: (m, meta) => emit("error", m, meta),
    };
}

export const silentLogger: Logger = createLogger("silent");
