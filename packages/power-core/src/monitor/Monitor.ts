import {
    type ErrorSummary,
    type PowerProfilerError,
    type PowerSourceError,
    MonitorStopTimeoutError,
    PermanentSourceError,
    TransientSourceError,
    classifySourceError,
    errorMessage,
    summarizeError,
} from "../errors/errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { type Reading, createReading } from "../readings/reading.js";
import type { PowerSample, PowerSource } from "../sources/PowerSource.js";
import { type PowerStatistics, computeStatistics } from "../stats/statistics.js";
import { driftCompensatedTicks } from "../timers/scheduler.js";
import { msToNs, nowNs, sleepMs } from "../timers/timing.js";
import { ReadingBuffer } from "./ReadingBuffer.js";

export type MonitorState = "idle" | "running" | "stopped";

export const DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD = 5;
export const DEFAULT_STOP_TIMEOUT_MS = 5000;

export interface MonitorOptions {
    name: string;
    source: PowerSource;
    intervalMs: number;
    /** Consecutive transient failures tolerated; one more stops the monitor. */
    consecutiveFailureThreshold?: number;
    /** Upper bound on how long stop() waits for the sampling loop. */
    stopTimeoutMs?: number;
    logger?: Logger;
    /** Wall clock used to stamp readings (ms since epoch). */
    clock?: () => number;
}

export interface MonitorStatus {
    name: string;
    source: string;
    state: MonitorState;
    intervalMs: number;
    readings: number;
    ticks: number;
    unavailableTicks: number;
    transientFailures: number;
    consecutiveFailures: number;
    overruns: number;
    lastError: ErrorSummary | null;
}

type TickOutcome = "appended" | "skipped" | "fault" | "aborted";

/**
 * Samples one power source at a fixed cadence into an in-memory buffer.
 *
 * idle --start()--> running --stop()/fault--> stopped --start()--> running
 *
 * The loop runs as its own async task. Transient failures skip a tick;
 * a permanent failure, or more than `consecutiveFailureThreshold`
 * transient failures in a row, stops the monitor from inside the loop.
 * Sibling monitors are never affected.
 */
export class Monitor {
    readonly name: string;
    readonly source: PowerSource;
    readonly intervalMs: number;
    readonly consecutiveFailureThreshold: number;
    readonly stopTimeoutMs: number;

    private readonly log: Logger;
    private readonly clock: () => number;
    private readonly buffer = new ReadingBuffer();

    private state: MonitorState = "idle";
    private lastError: PowerProfilerError | null = null;
    private consecutiveFailures = 0;

    private ticks = 0;
    private unavailableTicks = 0;
    private transientFailures = 0;
    private overruns = 0;

    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;

    constructor(options: MonitorOptions) {
        const {
            name,
            source,
            intervalMs,
            consecutiveFailureThreshold = DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD,
            stopTimeoutMs = DEFAULT_STOP_TIMEOUT_MS,
            logger,
            clock = Date.now,
        } = options;

        if (!name) {
            throw new RangeError("monitor name must not be empty");
        }
        if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
            throw new RangeError(`monitor "${name}": intervalMs must be > 0 (got ${intervalMs})`);
        }
        if (!Number.isInteger(consecutiveFailureThreshold) || consecutiveFailureThreshold < 0) {
            throw new RangeError(`monitor "${name}": consecutiveFailureThreshold must be an integer >= 0`);
        }
        if (!Number.isFinite(stopTimeoutMs) || stopTimeoutMs <= 0) {
            throw new RangeError(`monitor "${name}": stopTimeoutMs must be > 0`);
        }

        this.name = name;
        this.source = source;
        this.intervalMs = intervalMs;
        this.consecutiveFailureThreshold = consecutiveFailureThreshold;
        this.stopTimeoutMs = stopTimeoutMs;
        this.clock = clock;
        this.log = (logger ?? silentLogger()).child({ monitor: name, source: source.kind });
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    start(): void {
        if (this.state === "running") {
            this.log.debug("start() ignored, already running");
            return;
        }

        this.state = "running";
        this.lastError = null;
        this.consecutiveFailures = 0;
        // a counter sample from before the stop would span the whole idle gap
        this.source.reset?.();

        const controller = new AbortController();
        this.controller = controller;
        this.loop = this.runLoop(controller.signal);

        this.log.info({ intervalMs: this.intervalMs }, "monitor started");
    }

    /**
     * Stops the loop and returns a copy of the buffer. When the monitor is
     * not running, returns the buffer as it is.
     *
     * @throws MonitorStopTimeoutError when the loop does not exit within
     * `stopTimeoutMs`; the monitor is left stopped either way.
     */
    async stop(): Promise<Reading[]> {
        if (this.state !== "running") {
            return this.buffer.snapshot();
        }

        const controller = this.controller;
        const loop = this.loop;
        controller?.abort();

        if (loop && !(await this.waitForLoop(loop))) {
            const error = new MonitorStopTimeoutError(this.name, this.stopTimeoutMs);
            this.lastError = error;
            this.markStopped(controller);
            this.log.fatal({ err: error }, "sampling loop did not stop");
            throw error;
        }

        this.markStopped(controller);
        this.log.info({ readings: this.buffer.length }, "monitor stopped");
        return this.buffer.snapshot();
    }

    clear(): void {
        this.buffer.clear();
    }

    /* ---------------------------------------------------------------------- */
    /*  Queries                                                               */
    /* ---------------------------------------------------------------------- */

    isRunning(): boolean {
        return this.state === "running";
    }

    getState(): MonitorState {
        return this.state;
    }

    getLastError(): PowerProfilerError | null {
        return this.lastError;
    }

    getReadings(): Reading[] {
        return this.buffer.snapshot();
    }

    getStatistics(): PowerStatistics {
        const stats = computeStatistics(this.buffer.snapshot());
        if (stats.empty) {
            this.log.debug("statistics requested on an empty buffer");
        }
        return stats;
    }

    getStatus(): MonitorStatus {
        return {
            name: this.name,
            source: this.source.kind,
            state: this.state,
            intervalMs: this.intervalMs,
            readings: this.buffer.length,
            ticks: this.ticks,
            unavailableTicks: this.unavailableTicks,
            transientFailures: this.transientFailures,
            consecutiveFailures: this.consecutiveFailures,
            overruns: this.overruns,
            lastError: this.lastError ? summarizeError(this.lastError) : null,
        };
    }

    /* ---------------------------------------------------------------------- */
    /*  Sampling loop                                                         */
    /* ---------------------------------------------------------------------- */

    private async runLoop(signal: AbortSignal): Promise<void> {
        const periodNs = msToNs(this.intervalMs);

        try {
            for await (const tick of driftCompensatedTicks({ periodMs: this.intervalMs, signal })) {
                this.ticks++;

                const outcome = await this.sampleOnce(signal);
                if (outcome === "aborted") break;

                if (nowNs() - tick.startNs > periodNs) {
                    this.overruns++;
                    this.log.debug({ tick: tick.tickId }, "read took longer than the interval");
                }

                if (outcome === "fault") {
                    this.haltFromLoop(signal);
                    break;
                }
            }
        } catch (error) {
            // only reachable through a bug in the loop itself
            if (!signal.aborted) {
                this.lastError = new PermanentSourceError(`sampling loop crashed: ${errorMessage(error)}`, {
                    cause: error,
                });
                this.haltFromLoop(signal);
            }
        }
    }

    private async sampleOnce(signal: AbortSignal): Promise<TickOutcome> {
        let sample: PowerSample;
        try {
            sample = await this.source.read(signal);
        } catch (error) {
            if (signal.aborted) return "aborted";
            return this.recordFailure(classifySourceError(error));
        }
        if (signal.aborted) return "aborted";

        let reading: Reading;
        try {
            reading = createReading(this.clock(), sample.powerWatts, sample.metadata ?? {});
        } catch (error) {
            return this.recordFailure(
                new TransientSourceError(`${this.source.kind}: ${errorMessage(error)}`, { cause: error }),
            );
        }

        this.buffer.append(reading);
        this.consecutiveFailures = 0;
        return "appended";
    }

    private recordFailure(error: PowerSourceError): TickOutcome {
        switch (error.kind) {
            case "unavailable":
                this.unavailableTicks++;
                this.log.debug({ reason: error.message }, "no sample this tick");
                return "skipped";

            case "transient":
                this.transientFailures++;
                this.consecutiveFailures++;
                this.lastError = error;
                if (this.consecutiveFailures > this.consecutiveFailureThreshold) {
                    this.lastError = new PermanentSourceError(
                        `giving up after ${this.consecutiveFailures} consecutive transient failures: ${error.message}`,
                        { cause: error },
                    );
                    return "fault";
                }
                this.log.warn(
                    { err: error, consecutiveFailures: this.consecutiveFailures },
                    "transient read failure, tick skipped",
                );
                return "skipped";

            case "permanent":
                this.lastError = error;
                return "fault";
        }
    }

    private haltFromLoop(signal: AbortSignal): void {
        // a loop abandoned by a timed-out stop() must not touch a newer run
        if (this.controller?.signal !== signal) return;

        this.markStopped(this.controller);
        this.log.error({ err: this.lastError, readings: this.buffer.length }, "monitor stopped on fault");
    }

    private markStopped(controller: AbortController | null): void {
        if (this.controller !== controller) return;
        this.state = "stopped";
        this.controller = null;
        this.loop = null;
    }

    private async waitForLoop(loop: Promise<void>): Promise<boolean> {
        const timer = new AbortController();
        try {
            return await Promise.race([
                loop.then(() => true),
                sleepMs(this.stopTimeoutMs, timer.signal).then(() => false),
            ]);
        } finally {
            timer.abort();
        }
    }
}
