import {
    type ErrorSummary,
    CollectorStartError,
    PowerProfilerError,
    errorMessage,
    summarizeError,
} from "../errors/errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import type { Monitor, MonitorStatus } from "../monitor/Monitor.js";
import type { Reading } from "../readings/reading.js";
import type { PowerStatistics } from "../stats/statistics.js";
import { sleepMs } from "../timers/timing.js";

export type CollectorState = "idle" | "running" | "stopped";

export interface CollectionResult {
    readings: Record<string, Reading[]>;
    /** Monitors that failed to stop or stopped themselves on a fault. */
    faults: Record<string, ErrorSummary>;
}

export interface CollectorStatus {
    state: CollectorState;
    monitors: MonitorStatus[];
}

export interface CollectorOptions {
    logger?: Logger;
}

function toSummary(error: unknown): ErrorSummary {
    if (error instanceof PowerProfilerError) {
        return summarizeError(error);
    }
    return { kind: "internal", code: "STOP_FAILED", message: errorMessage(error) };
}

/**
 * Runs several monitors together. Each monitor samples and fails on its own;
 * the collector only starts them, stops them and gathers their buffers.
 */
export class Collector {
    private readonly monitors = new Map<string, Monitor>();
    private readonly log: Logger;
    private state: CollectorState = "idle";

    constructor(options: CollectorOptions = {}) {
        this.log = (options.logger ?? silentLogger()).child({ component: "collector" });
    }

    add(monitor: Monitor): this {
        if (this.monitors.has(monitor.name)) {
            throw new RangeError(`collector already has a monitor named "${monitor.name}"`);
        }
        this.monitors.set(monitor.name, monitor);
        return this;
    }

    get(name: string): Monitor | undefined {
        return this.monitors.get(name);
    }

    names(): string[] {
        return [...this.monitors.keys()];
    }

    /** Monitors in insertion order. */
    list(): Monitor[] {
        return [...this.monitors.values()];
    }

    getState(): CollectorState {
        return this.state;
    }

    /**
     * Starts every monitor in insertion order. When one of them fails to
     * start, those already started are stopped again and a
     * `CollectorStartError` is thrown.
     */
    async start(): Promise<void> {
        if (this.state === "running") {
            return;
        }
        if (this.monitors.size === 0) {
            throw new PowerProfilerError("COLLECTOR_EMPTY", "collector has no monitor to start");
        }

        const started: Monitor[] = [];
        for (const monitor of this.monitors.values()) {
            try {
                monitor.start();
                started.push(monitor);
            } catch (error) {
                this.log.error({ monitor: monitor.name, err: error }, "monitor failed to start, rolling back");
                await this.rollback(started);
                this.state = "stopped";
                throw new CollectorStartError(monitor.name, error);
            }
        }

        this.state = "running";
        this.log.info({ monitors: started.length }, "collector started");
    }

    /**
     * Stops every monitor, whatever happens to the others, and returns their
     * buffers. A monitor whose stop fails still contributes the readings it
     * holds; the failure goes to `faults`. So does the last error of a
     * monitor that stopped on a fault, or that ends with no reading at all.
     */
    async stop(): Promise<CollectionResult> {
        const monitors = [...this.monitors.values()];
        // a monitor already stopped with an error got there on its own
        const selfStopped = new Set(
            monitors.filter((m) => m.getState() === "stopped" && m.getLastError() !== null).map((m) => m.name),
        );

        const outcomes = await Promise.allSettled(monitors.map((monitor) => monitor.stop()));

        const result: CollectionResult = { readings: {}, faults: {} };
        monitors.forEach((monitor, i) => {
            const outcome = outcomes[i];
            if (outcome?.status === "fulfilled") {
                result.readings[monitor.name] = outcome.value;
                const lastError = monitor.getLastError();
                if (lastError !== null && (selfStopped.has(monitor.name) || outcome.value.length === 0)) {
                    result.faults[monitor.name] = summarizeError(lastError);
                }
            } else {
                result.readings[monitor.name] = monitor.getReadings();
                result.faults[monitor.name] = toSummary(outcome?.reason);
            }
        });

        this.state = "stopped";
        this.log.info(
            { monitors: monitors.length, faults: Object.keys(result.faults) },
            "collector stopped",
        );
        return result;
    }

    /**
     * start(), wait `durationMs` (cut short by `signal`), stop().
     */
    async collectFor(durationMs: number, signal?: AbortSignal): Promise<CollectionResult> {
        if (!Number.isFinite(durationMs) || durationMs <= 0) {
            throw new RangeError(`collectFor: durationMs must be > 0 (got ${durationMs})`);
        }
        await this.start();
        await sleepMs(durationMs, signal);
        return this.stop();
    }

    getStatus(): CollectorStatus {
        return {
            state: this.state,
            monitors: [...this.monitors.values()].map((monitor) => monitor.getStatus()),
        };
    }

    getStatistics(): Record<string, PowerStatistics> {
        const statistics: Record<string, PowerStatistics> = {};
        for (const [name, monitor] of this.monitors) {
            statistics[name] = monitor.getStatistics();
        }
        return statistics;
    }

    private async rollback(started: Monitor[]): Promise<void> {
        const outcomes = await Promise.allSettled(started.map((monitor) => monitor.stop()));
        outcomes.forEach((outcome, i) => {
            if (outcome.status === "rejected") {
                this.log.error({ monitor: started[i]?.name, err: outcome.reason }, "rollback stop failed");
            }
        });
    }
}
