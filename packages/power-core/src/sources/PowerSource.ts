import type { MetadataValue } from "../readings/reading.js";

export interface PowerSample {
    powerWatts: number;
    metadata?: Record<string, MetadataValue>;
}

/**
 * One hardware family behind a single capability. `read` resolves with a
 * sample or rejects with a `PowerSourceError`; anything else it throws is
 * treated as transient. `signal` aborts when the owning monitor stops.
 */
export interface PowerSource {
    readonly kind: string;
    read(signal?: AbortSignal): Promise<PowerSample>;
    /** Drops state carried between reads; called before every (re)start. */
    reset?(): void;
    /** Releases connections or handles; called once sampling is over. */
    close?(): Promise<void>;
}

export interface CounterSample {
    /** Raw counter value in the counter's native energy unit. */
    value: bigint;
    /** Monotonic time of the read, ns. */
    timeNs: bigint;
    metadata?: Record<string, MetadataValue>;
}

/**
 * Raw accessor for a monotonically increasing, wrapping energy counter.
 */
export interface EnergyCounter {
    readonly kind: string;
    read(signal?: AbortSignal): Promise<CounterSample>;
}
