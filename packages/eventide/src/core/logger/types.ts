export type LogLevel = "trace" | "debug" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

/** Called synchronously, also from inside `publish`. Handlers must not throw. */
export type LogHandler = (entry: LogEntry) => void;

/** Numeric rank per level; a handler with `minLevel` drops entries ranked below it. */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    warn: 2,
    error: 3,
};
