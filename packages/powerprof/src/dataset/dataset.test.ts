import test, { after, before } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createReading } from "@powerprof/core";
import { DatasetError, buildDataset, parseDataset, readDataset, writeDataset } from "./dataset.js";

const T0 = Date.parse("2026-03-01T10:00:00.000Z");

const result = {
    readings: {
        "rapl-package-0": [
            createReading(T0, 12.5, { node: "intel-rapl:0" }),
            createReading(T0 + 1000, 14, { node: "intel-rapl:0" }),
        ],
        gpu: [],
    },
    faults: {
        gpu: { kind: "permanent" as const, code: "SOURCE_PERMANENT", message: "nvidia-smi: nvidia-smi not found" },
    },
};

test("buildDataset", async (t) => {
    await t.test("serializes readings with ISO timestamps", () => {
        const dataset = buildDataset(result, {
            intervalMs: 1000,
            command: ["node", "app.js"],
            createdAt: new Date(T0),
        });

        assert.strictEqual(dataset.version, 1);
        assert.strictEqual(dataset.createdAt, "2026-03-01T10:00:00.000Z");
        assert.deepStrictEqual(dataset.command, ["node", "app.js"]);
        assert.deepStrictEqual(dataset.sources["rapl-package-0"], [
            { timestamp: "2026-03-01T10:00:00.000Z", powerWatts: 12.5, metadata: { node: "intel-rapl:0" } },
            { timestamp: "2026-03-01T10:00:01.000Z", powerWatts: 14, metadata: { node: "intel-rapl:0" } },
        ]);
        assert.deepStrictEqual(dataset.sources.gpu, []);
        assert.deepStrictEqual(dataset.faults, result.faults);
    });

    await t.test("an empty command is left out", () => {
        const dataset = buildDataset(result, { intervalMs: 1000, command: [] });
        assert.strictEqual("command" in dataset, false);
    });
});

test("writeDataset / readDataset", async (t) => {
    let tmpRoot = "";

    before(async () => {
        tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "powerprof-dataset-"));
    });

    after(async () => {
        await fs.rm(tmpRoot, { recursive: true, force: true });
    });

    await t.test("a written dataset reads back", async () => {
        const file = path.join(tmpRoot, "run.json");
        await writeDataset(file, buildDataset(result, { intervalMs: 500, createdAt: new Date(T0) }));

        const text = await fs.readFile(file, "utf-8");
        assert.ok(text.endsWith("}\n"));

        const loaded = await readDataset(file);
        assert.strictEqual(loaded.createdAt, "2026-03-01T10:00:00.000Z");
        assert.strictEqual(loaded.intervalMs, 500);
        assert.strictEqual(loaded.command, undefined);
        assert.deepStrictEqual(
            loaded.sources["rapl-package-0"]?.map((r) => [r.timestamp, r.powerWatts]),
            [
                [T0, 12.5],
                [T0 + 1000, 14],
            ],
        );
        assert.deepStrictEqual(loaded.faults, result.faults);
    });

    await t.test("a missing file is a DatasetError", async () => {
        await assert.rejects(readDataset(path.join(tmpRoot, "nope.json")), DatasetError);
    });

    await t.test("invalid JSON is a DatasetError", async () => {
        const file = path.join(tmpRoot, "broken.json");
        await fs.writeFile(file, "{");
        await assert.rejects(readDataset(file), DatasetError);
    });
});

test("parseDataset rejects malformed documents", () => {
    const base = { version: 1, createdAt: "2026-03-01T10:00:00.000Z", intervalMs: 1000, sources: {} };
    const cases: Array<[unknown, string]> = [
        ["run", "dataset must be a JSON object"],
        [{ ...base, version: 2 }, "dataset.version 2 is not supported (expected 1)"],
        [{ createdAt: base.createdAt, intervalMs: 1000, sources: {} }, "dataset.version undefined is not supported (expected 1)"],
        [{ ...base, createdAt: 1 }, "dataset.createdAt must be a string"],
        [{ ...base, intervalMs: 0 }, "dataset.intervalMs must be a positive number"],
        [{ ...base, command: ["ok", 1] }, "dataset.command must be an array of strings"],
        [{ ...base, sources: [] }, "dataset.sources must be an object"],
        [{ ...base, sources: { cpu: {} } }, "sources.cpu must be an array of readings"],
        [
            { ...base, sources: { cpu: [{ timestamp: "2026-03-01T10:00:00.000Z", powerWatts: "12" }] } },
            "sources.cpu[0]: reading.powerWatts must be a number",
        ],
        [{ ...base, faults: { cpu: { kind: "fatal", code: "X", message: "m" } } }, "faults.cpu must be {kind, code, message}"],
    ];
    for (const [raw, message] of cases) {
        assert.throws(() => parseDataset(raw), { name: "DatasetError", message });
    }
});
