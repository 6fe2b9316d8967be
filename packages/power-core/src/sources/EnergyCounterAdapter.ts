import {
    PermanentSourceError,
    SourceUnavailableError,
    TransientSourceError,
} from "../errors/errors.js";
import { nsToSeconds } from "../timers/timing.js";
import type { EnergyCounter, PowerSample, PowerSource } from "./PowerSource.js";

export interface EnergyCounterAdapterOptions {
    counter: EnergyCounter;
    /** Value at which the counter wraps back to 0, in native units (RAPL: max_energy_range_uj). */
    wrapMax: bigint;
    /** Native counter units per joule: 1e6 for a µJ counter, 1 when already in joules. */
    unitsPerJoule?: number;
}

/**
 * Turns an energy counter into a power source by differencing two
 * consecutive reads. The first read only primes the adapter.
 *
 * A counter lower than its previous value is taken to have wrapped
 * exactly once; two wraps within one interval cannot be detected.
 */
export class EnergyCounterAdapter implements PowerSource {
    readonly kind: string;
    readonly wrapMax: bigint;
    readonly unitsPerJoule: number;

    private readonly counter: EnergyCounter;
    private lastValue: bigint | null = null;
    private lastTimeNs: bigint | null = null;

    constructor(options: EnergyCounterAdapterOptions) {
        const { counter, wrapMax, unitsPerJoule = 1 } = options;
        if (wrapMax <= 0n) {
            throw new RangeError(`wrapMax must be > 0 (got ${wrapMax})`);
        }
        if (!Number.isFinite(unitsPerJoule) || unitsPerJoule <= 0) {
            throw new RangeError(`unitsPerJoule must be > 0 (got ${unitsPerJoule})`);
        }
        this.counter = counter;
        this.kind = counter.kind;
        this.wrapMax = wrapMax;
        this.unitsPerJoule = unitsPerJoule;
    }

    get primed(): boolean {
        return this.lastValue !== null;
    }

    /** Forgets the stored sample; the next read primes again. */
    reset(): void {
        this.lastValue = null;
        this.lastTimeNs = null;
    }

    async read(signal?: AbortSignal): Promise<PowerSample> {
        const sample = await this.counter.read(signal);
        const { value, timeNs } = sample;

        if (value < 0n || value > this.wrapMax) {
            throw new PermanentSourceError(
                `${this.kind}: counter value ${value} outside [0, ${this.wrapMax}], wrapMax does not match this counter`,
            );
        }

        const lastValue = this.lastValue;
        const lastTimeNs = this.lastTimeNs;
        this.lastValue = value;
        this.lastTimeNs = timeNs;

        if (lastValue === null || lastTimeNs === null) {
            throw new SourceUnavailableError(`${this.kind}: first counter sample, no rate yet`);
        }

        const dtNs = timeNs - lastTimeNs;
        if (dtNs <= 0n) {
            throw new TransientSourceError(`${this.kind}: non-increasing read time (dt=${dtNs}ns)`);
        }

        const wrapped = value < lastValue;
        const deltaCounter = wrapped ? this.wrapMax - lastValue + value : value - lastValue;

        const deltaSeconds = nsToSeconds(dtNs);
        const deltaEnergyJoules = Number(deltaCounter) / this.unitsPerJoule;

        return {
            powerWatts: deltaEnergyJoules / deltaSeconds,
            metadata: {
                ...sample.metadata,
                deltaEnergyJoules,
                deltaSeconds,
                wrapped,
            },
        };
    }
}
