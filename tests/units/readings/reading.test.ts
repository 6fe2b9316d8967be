import assert from "node:assert/strict";
import test from "node:test";
import {
    InvalidReadingError,
    createReading,
    parseReading,
    serializeReading,
} from "../../../packages/power-core/src/index.js";

test("reading", async (t) => {
    await t.test("rejects NaN, infinite and negative power", () => {
        for (const bad of [Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, -0.5]) {
            assert.throws(() => createReading(0, bad), InvalidReadingError);
        }
        assert.strictEqual(createReading(0, 0).powerWatts, 0);
    });

    await t.test("is frozen and does not alias the caller's metadata", () => {
        const metadata = { node: "intel-rapl:0", nested: { a: 1 } };
        const reading = createReading(1000, 12.5, metadata);
        metadata.node = "changed";

        assert.ok(Object.isFrozen(reading));
        assert.ok(Object.isFrozen(reading.metadata));
        assert.deepStrictEqual(reading.metadata, { node: "intel-rapl:0", nested: { a: 1 } });
    });

    await t.test("serializes the timestamp as ISO-8601 and parses it back", () => {
        const reading = createReading(Date.UTC(2024, 0, 2, 3, 4, 5, 600), 80, { gpu: 0 });
        const serialized = serializeReading(reading);

        assert.deepStrictEqual(serialized, {
            timestamp: "2024-01-02T03:04:05.600Z",
            powerWatts: 80,
            metadata: { gpu: 0 },
        });
        assert.deepStrictEqual(parseReading(JSON.parse(JSON.stringify(serialized))), reading);
    });

    await t.test("parseReading accepts epoch ms and defaults metadata to {}", () => {
        const reading = parseReading({ timestamp: 1234, powerWatts: 3 });
        assert.deepStrictEqual(reading, { timestamp: 1234, powerWatts: 3, metadata: {} });
    });

    await t.test("parseReading rejects malformed input", () => {
        assert.throws(() => parseReading(null), /must be an object/);
        assert.throws(() => parseReading({ powerWatts: 1 }), /timestamp/);
        assert.throws(() => parseReading({ timestamp: "not a date", powerWatts: 1 }), /invalid timestamp/);
        assert.throws(() => parseReading({ timestamp: 0, powerWatts: "1" }), /powerWatts must be a number/);
        assert.throws(() => parseReading({ timestamp: 0, powerWatts: 1, metadata: [1] }), /metadata/);
        assert.throws(() => parseReading({ timestamp: 0, powerWatts: -1 }), /invalid power value/);
    });
});
