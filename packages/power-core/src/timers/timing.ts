import process from "node:process";

export const NS_PER_MS = 1_000_000n;
export const NS_PER_S = 1_000_000_000n;

/**
 * Monotonic clock, in nanoseconds.
 */
export function nowNs(): bigint {
    return process.hrtime.bigint();
}

/**
 * ms (number) -> ns (bigint), rounded to dodge float noise.
 */
export function msToNs(ms: number): bigint {
    return BigInt(Math.round(ms * 1e6));
}

/**
 * ns -> ms for setTimeout. Rounded up so the timer never fires early
 * because of truncation.
 */
export function nsToMsCeil(ns: bigint): number {
    if (ns <= 0n) return 0;
    return Number((ns + NS_PER_MS - 1n) / NS_PER_MS);
}

export function nsToSeconds(ns: bigint): number {
    return Number(ns) / 1e9;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects; the
 * caller checks `signal.aborted` to tell the two apart.
 */
export function sleepMs(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.resolve();

    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Waits until `deadlineNs` on the monotonic clock.
 * - already past the deadline => returns at once
 * - otherwise => setTimeout(remaining), cut short by `signal`
 *
 * setTimeout only guarantees "not before"; read nowNs() after waking up.
 */
export async function sleepUntilNs(deadlineNs: bigint, signal?: AbortSignal): Promise<void> {
    const remainingNs = deadlineNs - nowNs();
    if (remainingNs <= 0n) return;
    await sleepMs(nsToMsCeil(remainingNs), signal);
}
