import assert from "node:assert/strict";
import test from "node:test";
import {
    CollectorStartError,
    MonitorStopTimeoutError,
    PermanentSourceError,
    PowerSourceError,
    SourceUnavailableError,
    TransientSourceError,
    classifySourceError,
    summarizeError,
} from "../../../packages/power-core/src/index.js";

test("errors", async (t) => {
    await t.test("every source error has exactly one kind", () => {
        assert.strictEqual(new TransientSourceError("a").kind, "transient");
        assert.strictEqual(new PermanentSourceError("b").kind, "permanent");
        assert.strictEqual(new SourceUnavailableError("c").kind, "unavailable");
        assert.strictEqual(new TransientSourceError("a").name, "TransientSourceError");
    });

    await t.test("classifySourceError keeps typed errors as they are", () => {
        const permanent = new PermanentSourceError("gone");
        assert.strictEqual(classifySourceError(permanent), permanent);
    });

    await t.test("classifySourceError turns anything else into a transient error", () => {
        const cause = new Error("EBUSY");
        const classified = classifySourceError(cause);
        assert.ok(classified instanceof PowerSourceError);
        assert.strictEqual(classified.kind, "transient");
        assert.strictEqual(classified.message, "EBUSY");
        assert.strictEqual(classified.cause, cause);

        assert.strictEqual(classifySourceError("plain string").message, "plain string");
    });

    await t.test("summarizeError", () => {
        assert.deepStrictEqual(summarizeError(new SourceUnavailableError("priming")), {
            kind: "unavailable",
            code: "SOURCE_UNAVAILABLE",
            message: "priming",
        });
        assert.deepStrictEqual(summarizeError(new MonitorStopTimeoutError("rapl-package-0", 5000)), {
            kind: "internal",
            code: "MONITOR_STOP_TIMEOUT",
            message: 'monitor "rapl-package-0": sampling loop did not stop within 5000ms',
        });
    });

    await t.test("CollectorStartError names the monitor and keeps the cause", () => {
        const cause = new Error("boom");
        const error = new CollectorStartError("gpu", cause);
        assert.strictEqual(error.code, "COLLECTOR_START_FAILED");
        assert.strictEqual(error.message, 'monitor "gpu" failed to start: boom');
        assert.strictEqual(error.cause, cause);
    });
});
