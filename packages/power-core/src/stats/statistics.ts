import type { Reading } from "../readings/reading.js";

export interface PowerPercentiles {
    p25: number;
    p50: number;
    p75: number;
    p90: number;
    p95: number;
    p99: number;
}

export interface PowerStatistics {
    /** true when computed over no reading; every figure is then 0. */
    empty: boolean;
    count: number;
    average: number;
    peak: number;
    min: number;
    median: number;
    stdDev: number;
    percentiles: PowerPercentiles;
    totalEnergyJoules: number;
    durationSeconds: number;
}

const EMPTY_STATISTICS: PowerStatistics = Object.freeze({
    empty: true,
    count: 0,
    average: 0,
    peak: 0,
    min: 0,
    median: 0,
    stdDev: 0,
    percentiles: Object.freeze({ p25: 0, p50: 0, p75: 0, p90: 0, p95: 0, p99: 0 }),
    totalEnergyJoules: 0,
    durationSeconds: 0,
});

/**
 * Left Riemann sum of power over time: every reading contributes its power
 * times the gap to its successor, the last one contributes nothing.
 *
 * Readings are taken in the given order. Time ordering is a precondition:
 * an out-of-order pair yields a negative gap and the sum is wrong.
 */
export function totalEnergyJoules(readings: readonly Reading[]): number {
    let joules = 0;
    for (let i = 0; i < readings.length - 1; i++) {
        const dtSeconds = (readings[i + 1].timestamp - readings[i].timestamp) / 1000;
        joules += readings[i].powerWatts * dtSeconds;
    }
    return joules;
}

/** Linear interpolation between closest ranks; `sorted` must be ascending. */
export function percentile(sorted: readonly number[], p: number): number {
    if (sorted.length === 0) return 0;
    if (sorted.length === 1) return sorted[0];

    const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
    const lower = Math.floor(rank);
    const upper = Math.ceil(rank);
    const weight = rank - lower;
    return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function computeStatistics(readings: readonly Reading[]): PowerStatistics {
    if (readings.length === 0) {
        return { ...EMPTY_STATISTICS, percentiles: { ...EMPTY_STATISTICS.percentiles } };
    }

    const powers = readings.map((r) => r.powerWatts);
    const sorted = [...powers].sort((a, b) => a - b);

    let sum = 0;
    for (const p of powers) sum += p;
    const average = sum / powers.length;

    let squares = 0;
    for (const p of powers) squares += (p - average) ** 2;

    return {
        empty: false,
        count: readings.length,
        average,
        peak: sorted[sorted.length - 1],
        min: sorted[0],
        median: percentile(sorted, 50),
        stdDev: Math.sqrt(squares / powers.length),
        percentiles: {
            p25: percentile(sorted, 25),
            p50: percentile(sorted, 50),
            p75: percentile(sorted, 75),
            p90: percentile(sorted, 90),
            p95: percentile(sorted, 95),
            p99: percentile(sorted, 99),
        },
        totalEnergyJoules: totalEnergyJoules(readings),
        durationSeconds: (readings[readings.length - 1].timestamp - readings[0].timestamp) / 1000,
    };
}
