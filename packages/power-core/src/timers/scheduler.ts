import { msToNs, nowNs, sleepUntilNs } from "./timing.js";

export interface TickTiming {
    tickId: number;
    periodNs: bigint;

    startNs: bigint;
    /** startNs[n] - startNs[n-1]; 0 on the first tick. */
    dtNs: bigint;
}

/**
 * Drift-compensated ticks: after the consumer is done with a tick, sleeps
 * `max(0, period - work)` measured from that tick's start. A tick whose
 * work exceeds the period is followed immediately by the next one; there
 * is no catch-up burst and no skipped slot.
 *
 * The sleep is cut short by `signal`, and no tick is yielded once it has
 * aborted.
 */
export async function* driftCompensatedTicks(options: {
    periodMs: number;
    signal?: AbortSignal;
}): AsyncGenerator<TickTiming> {
    if (!Number.isFinite(options.periodMs) || options.periodMs <= 0) {
        throw new RangeError("driftCompensatedTicks: periodMs must be a positive number");
    }
    const periodNs = msToNs(options.periodMs);
    const { signal } = options;

    let tickId = 0;
    let prevStartNs: bigint | null = null;

    while (!signal?.aborted) {
        const startNs = nowNs();
        const dtNs = prevStartNs === null ? 0n : startNs - prevStartNs;

        yield { tickId, periodNs, startNs, dtNs };

        await sleepUntilNs(startNs + periodNs, signal);

        prevStartNs = startNs;
        tickId++;
    }
}
