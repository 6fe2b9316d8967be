import process from "node:process";
import pino, { type DestinationStream, type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";
export type LogLevel = LevelWithSilent;

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface LoggerOptions {
    level?: LogLevel;
    /** Where JSON lines go; stderr by default so stdout stays free for reports. */
    destination?: DestinationStream;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
    const level = options.level ?? parseLogLevel(process.env.POWERPROF_LOG_LEVEL) ?? "warn";
    return pino(
        {
            name,
            level,
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        options.destination ?? pino.destination(2),
    );
}

export function silentLogger(): Logger {
    return pino({ level: "silent" });
}
