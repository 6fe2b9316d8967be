export type SourceErrorKind = "transient" | "permanent" | "unavailable";

export interface ErrorSummary {
    kind: SourceErrorKind | "internal";
    code: string;
    message: string;
}

/**
 * Root of every error raised by this package. `code` is a stable,
 * machine-readable identifier; `message` is for humans.
 */
export class PowerProfilerError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Failure of a single `PowerSource.read()` call. Every failure belongs to
 * exactly one kind:
 *
 * - `transient`: retry on the next tick (busy sysfs node, dropped HTTP call);
 * - `permanent`: will never succeed (unsupported device, bad credentials);
 * - `unavailable`: no data yet (first sample of a derived rate).
 */
export abstract class PowerSourceError extends PowerProfilerError {
    abstract readonly kind: SourceErrorKind;
}

export class TransientSourceError extends PowerSourceError {
    readonly kind = "transient";

    constructor(message: string, options?: { cause?: unknown }) {
        super("SOURCE_TRANSIENT", message, options);
    }
}

export class PermanentSourceError extends PowerSourceError {
    readonly kind = "permanent";

    constructor(message: string, options?: { cause?: unknown }) {
        super("SOURCE_PERMANENT", message, options);
    }
}

export class SourceUnavailableError extends PowerSourceError {
    readonly kind = "unavailable";

    constructor(message: string, options?: { cause?: unknown }) {
        super("SOURCE_UNAVAILABLE", message, options);
    }
}

export class InvalidReadingError extends PowerProfilerError {
    constructor(message: string) {
        super("INVALID_READING", message);
    }
}

export class MonitorStopTimeoutError extends PowerProfilerError {
    readonly monitor: string;
    readonly timeoutMs: number;

    constructor(monitor: string, timeoutMs: number) {
        super(
            "MONITOR_STOP_TIMEOUT",
            `monitor "${monitor}": sampling loop did not stop within ${timeoutMs}ms`,
        );
        this.monitor = monitor;
        this.timeoutMs = timeoutMs;
    }
}

export class CollectorStartError extends PowerProfilerError {
    readonly monitor: string;

    constructor(monitor: string, cause: unknown) {
        super("COLLECTOR_START_FAILED", `monitor "${monitor}" failed to start: ${errorMessage(cause)}`, { cause });
        this.monitor = monitor;
    }
}

export class ConfigError extends PowerProfilerError {
    constructor(message: string) {
        super("INVALID_CONFIG", message);
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Maps anything a source may throw onto exactly one kind. Untyped errors
 * count as transient: the monitor retries them within its failure budget.
 */
export function classifySourceError(error: unknown): PowerSourceError {
    if (error instanceof PowerSourceError) {
        return error;
    }
    return new TransientSourceError(errorMessage(error), { cause: error });
}

export function summarizeError(error: PowerProfilerError): ErrorSummary {
    return {
        kind: error instanceof PowerSourceError ? error.kind : "internal",
        code: error.code,
        message: error.message,
    };
}
