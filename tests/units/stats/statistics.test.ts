import assert from "node:assert/strict";
import test from "node:test";
import {
    computeStatistics,
    createReading,
    percentile,
    totalEnergyJoules,
} from "../../../packages/power-core/src/index.js";

const T0 = 1_700_000_000_000;

function series(points: Array<[seconds: number, watts: number]>) {
    return points.map(([s, w]) => createReading(T0 + s * 1000, w));
}

test("statistics", async (t) => {
    await t.test("computes average, peak, min and energy over three readings", () => {
        const stats = computeStatistics(series([[0, 5], [1, 7], [2, 6]]));

        assert.strictEqual(stats.empty, false);
        assert.strictEqual(stats.count, 3);
        assert.strictEqual(stats.average, 6);
        assert.strictEqual(stats.peak, 7);
        assert.strictEqual(stats.min, 5);
        assert.strictEqual(stats.median, 6);
        assert.strictEqual(stats.totalEnergyJoules, 12);
        assert.strictEqual(stats.durationSeconds, 2);
        assert.ok(Math.abs(stats.stdDev - Math.sqrt(2 / 3)) < 1e-12);
    });

    await t.test("energy is a left Riemann sum: the last reading adds nothing", () => {
        assert.strictEqual(totalEnergyJoules(series([[0, 10], [0.5, 20], [2, 1000]])), 10 * 0.5 + 20 * 1.5);
    });

    await t.test("never sorts: reversed timestamps give negative energy", () => {
        const reversed = series([[2, 6], [1, 7], [0, 5]]);
        assert.strictEqual(totalEnergyJoules(reversed), -13);
    });

    await t.test("empty input gives zeros and empty=true", () => {
        const stats = computeStatistics([]);
        assert.deepStrictEqual(stats, {
            empty: true,
            count: 0,
            average: 0,
            peak: 0,
            min: 0,
            median: 0,
            stdDev: 0,
            percentiles: { p25: 0, p50: 0, p75: 0, p90: 0, p95: 0, p99: 0 },
            totalEnergyJoules: 0,
            durationSeconds: 0,
        });
    });

    await t.test("a single reading has no energy and no duration", () => {
        const stats = computeStatistics(series([[0, 42]]));
        assert.strictEqual(stats.average, 42);
        assert.strictEqual(stats.peak, 42);
        assert.strictEqual(stats.min, 42);
        assert.strictEqual(stats.totalEnergyJoules, 0);
        assert.strictEqual(stats.durationSeconds, 0);
        assert.strictEqual(stats.percentiles.p99, 42);
    });

    await t.test("percentiles interpolate between ranks", () => {
        const sorted = [10, 20, 30, 40, 50];
        assert.strictEqual(percentile(sorted, 0), 10);
        assert.strictEqual(percentile(sorted, 50), 30);
        assert.strictEqual(percentile(sorted, 25), 20);
        assert.strictEqual(percentile(sorted, 100), 50);
        assert.strictEqual(percentile([5, 7], 50), 6);
        assert.strictEqual(percentile([], 50), 0);
    });
});
