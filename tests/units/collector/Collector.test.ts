import assert from "node:assert/strict";
import test from "node:test";
import {
    Collector,
    CollectorStartError,
    Monitor,
    PermanentSourceError,
    PowerProfilerError,
    TransientSourceError,
} from "../../../packages/power-core/src/index.js";
import { FakeSource, hangingRead, waitFor } from "../../../utils/test-utils.js";

class UnstartableMonitor extends Monitor {
    override start(): void {
        throw new Error("device busy");
    }
}

function monitor(name: string, source: FakeSource, intervalMs = 10) {
    return new Monitor({ name, source, intervalMs });
}

test("Collector", async (t) => {
    await t.test("starts and stops every monitor, keyed by name", async () => {
        const collector = new Collector().add(monitor("cpu", new FakeSource([20]))).add(monitor("gpu", new FakeSource([150])));
        assert.deepStrictEqual(collector.names(), ["cpu", "gpu"]);
        assert.strictEqual(collector.getState(), "idle");

        await collector.start();
        assert.strictEqual(collector.getState(), "running");
        await waitFor(() => collector.getStatus().monitors.every((m) => m.readings >= 2));

        const result = await collector.stop();
        assert.strictEqual(collector.getState(), "stopped");
        assert.deepStrictEqual(Object.keys(result.readings), ["cpu", "gpu"]);
        assert.ok(result.readings.cpu?.every((r) => r.powerWatts === 20));
        assert.ok(result.readings.gpu?.every((r) => r.powerWatts === 150));
        assert.deepStrictEqual(result.faults, {});
        assert.strictEqual(collector.get("cpu")?.isRunning(), false);
    });

    await t.test("refuses two monitors with the same name", () => {
        const collector = new Collector().add(monitor("cpu", new FakeSource([1])));
        assert.throws(() => collector.add(monitor("cpu", new FakeSource([2]))), /already has a monitor named "cpu"/);
    });

    await t.test("refuses to start without monitors", async () => {
        await assert.rejects(new Collector().start(), PowerProfilerError);
    });

    await t.test("a monitor failing to start rolls back the ones already started", async () => {
        const first = monitor("first", new FakeSource([1]));
        const broken = new UnstartableMonitor({ name: "broken", source: new FakeSource([1]), intervalMs: 10 });
        const never = monitor("never", new FakeSource([1]));
        const collector = new Collector().add(first).add(broken).add(never);

        await assert.rejects(collector.start(), (error: unknown) => {
            assert.ok(error instanceof CollectorStartError);
            assert.strictEqual(error.monitor, "broken");
            assert.strictEqual(error.message, 'monitor "broken" failed to start: device busy');
            return true;
        });

        assert.strictEqual(first.getState(), "stopped");
        assert.strictEqual(never.getState(), "idle");
        assert.strictEqual(collector.getState(), "stopped");
    });

    await t.test("a faulted monitor does not take down its siblings", async () => {
        const healthy = monitor("healthy", new FakeSource([30]));
        const faulty = monitor("faulty", new FakeSource([12, new PermanentSourceError("counter vanished")]));
        const collector = new Collector().add(healthy).add(faulty);

        await collector.start();
        await waitFor(() => !faulty.isRunning() && healthy.getReadings().length >= 3);
        assert.strictEqual(healthy.isRunning(), true);

        const result = await collector.stop();
        assert.deepStrictEqual(result.readings.faulty?.map((r) => r.powerWatts), [12]);
        assert.ok((result.readings.healthy?.length ?? 0) >= 3);
        assert.deepStrictEqual(result.faults, {
            faulty: { kind: "permanent", code: "SOURCE_PERMANENT", message: "counter vanished" },
        });
    });

    await t.test("a stop timeout is reported as a fault and other readings survive", async () => {
        const stuck = new Monitor({
            name: "stuck",
            source: new FakeSource([5, hangingRead(true)]),
            intervalMs: 10,
            stopTimeoutMs: 50,
        });
        const fine = monitor("fine", new FakeSource([7]));
        const collector = new Collector().add(stuck).add(fine);

        await collector.start();
        await waitFor(() => stuck.getReadings().length === 1 && fine.getReadings().length >= 1);
        await new Promise((resolve) => setTimeout(resolve, 20));

        const result = await collector.stop();
        assert.deepStrictEqual(result.readings.stuck?.map((r) => r.powerWatts), [5]);
        assert.ok((result.readings.fine?.length ?? 0) >= 1);
        assert.strictEqual(result.faults.stuck?.code, "MONITOR_STOP_TIMEOUT");
        assert.strictEqual(result.faults.fine, undefined);
    });

    await t.test("collectFor runs every monitor for the given duration", async () => {
        const collector = new Collector()
            .add(monitor("a", new FakeSource([10]), 500))
            .add(monitor("b", new FakeSource([20]), 500));

        const result = await collector.collectFor(2000);

        for (const name of ["a", "b"]) {
            const count = result.readings[name]?.length ?? 0;
            assert.ok(count >= 3 && count <= 5, `${name}: ${count} readings`);
        }
        assert.strictEqual(collector.getState(), "stopped");
    });

    await t.test("collectFor is cut short by its signal", async () => {
        const collector = new Collector().add(monitor("a", new FakeSource([1])));
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 30);

        const started = Date.now();
        await collector.collectFor(60_000, controller.signal);
        assert.ok(Date.now() - started < 2000);
        assert.strictEqual(collector.getState(), "stopped");
    });

    await t.test("a running monitor without any reading reports its last error", async () => {
        const collector = new Collector()
            .add(
                new Monitor({
                    name: "bmc",
                    source: new FakeSource([new TransientSourceError("HTTP 503")]),
                    intervalMs: 10,
                    consecutiveFailureThreshold: 1000,
                }),
            )
            .add(
                new Monitor({
                    name: "ok",
                    source: new FakeSource([new TransientSourceError("blip"), 8]),
                    intervalMs: 10,
                }),
            );

        const result = await collector.collectFor(60);

        assert.deepStrictEqual(result.readings.bmc, []);
        assert.deepStrictEqual(result.faults.bmc, {
            kind: "transient",
            code: "SOURCE_TRANSIENT",
            message: "HTTP 503",
        });
        assert.ok((result.readings.ok?.length ?? 0) >= 1);
        assert.strictEqual(result.faults.ok, undefined);
    });

    await t.test("collectFor rejects a non-positive duration", async () => {
        const collector = new Collector().add(monitor("a", new FakeSource([1])));
        await assert.rejects(collector.collectFor(0), RangeError);
        assert.strictEqual(collector.getState(), "idle");
    });

    await t.test("getStatistics reports each monitor", async () => {
        const collector = new Collector().add(monitor("a", new FakeSource([4]))).add(monitor("b", new FakeSource([1])));
        await collector.start();
        await waitFor(() => (collector.get("a")?.getReadings().length ?? 0) >= 2);
        await collector.stop();

        const stats = collector.getStatistics();
        assert.deepStrictEqual(Object.keys(stats), ["a", "b"]);
        assert.strictEqual(stats.a?.average, 4);
        assert.strictEqual(stats.a?.peak, 4);
    });
});
