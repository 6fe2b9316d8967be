import test, { after, before } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { raplProbe } from "../../../../packages/power-core/src/index.js";
import { createRaplPackages } from "../../../../utils/test-utils.js";

test("rapl-probe test-suite", async (t) => {
    let tmpRoot = "";

    before(async () => {
        tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "rapl-probe-tests-"));
    });

    after(async () => {
        await fs.rm(tmpRoot, { recursive: true, force: true });
    });

    await t.test("should respond FAILED when the powercap root does not exist", async () => {
        const missing = path.join(tmpRoot, "does-not-exist");
        const probe = await raplProbe(missing);
        assert.deepStrictEqual(probe, { status: "FAILED", packages: [], hint: `${missing} not found` });
    });

    await t.test("should respond FAILED when no RAPL package is found", async () => {
        const emptyDir = path.join(tmpRoot, "empty-powercap");
        await fs.mkdir(emptyDir, { recursive: true });

        const probe = await raplProbe(emptyDir);
        assert.strictEqual(probe.status, "FAILED");
        assert.strictEqual(
            probe.hint,
            `No RAPL packages (intel-rapl:N or amd-rapl:N) found in ${emptyDir}. VM without powercap ?`,
        );
    });

    await t.test("should respond OK when RAPL is available", async () => {
        const base = path.join(tmpRoot, "ok");
        const pkg = await createRaplPackages(base, "intel-rapl:0", {
            name: "package-0",
            energy: 123456789n,
            maxRange: 987654321n,
        });
        // sub-zones are not packages
        await createRaplPackages(base, "intel-rapl:0:0", { name: "core", energy: 1n, maxRange: 10n });

        const probe = await raplProbe(base);
        assert.deepStrictEqual(probe, {
            status: "OK",
            vendor: "intel",
            packages: [
                {
                    vendor: "intel",
                    node: "intel-rapl:0",
                    path: pkg.dir,
                    name: "package-0",
                    hasEnergyReadable: true,
                    reason: null,
                    maxEnergyRangeUj: 987654321n,
                    files: {
                        energyUj: pkg.files.energyPath,
                        maxEnergyRangeUj: pkg.files.maxRangePath,
                    },
                },
            ],
            hint: null,
        });
    });

    await t.test("should respond DEGRADED when no energy_uj is readable", async () => {
        const base = path.join(tmpRoot, "degraded");
        const dir = path.join(base, "amd-rapl:0");
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(path.join(dir, "name"), "package-0\n");

        const probe = await raplProbe(base);
        assert.strictEqual(probe.status, "DEGRADED");
        assert.strictEqual(probe.vendor, "amd");
        assert.strictEqual(probe.hint, "RAPL energy_uj files are not readable (permission denied ?)");
        assert.strictEqual(probe.packages[0]?.reason, "not_found");
        assert.strictEqual(probe.packages[0]?.maxEnergyRangeUj, null);
    });

    await t.test("lists packages in node order with their own counter width", async () => {
        const base = path.join(tmpRoot, "multi");
        await createRaplPackages(base, "intel-rapl:1", { name: "package-1", energy: 2n, maxRange: 200n });
        await createRaplPackages(base, "intel-rapl:0", { name: "package-0", energy: 1n, maxRange: 100n });

        const probe = await raplProbe(base);
        assert.deepStrictEqual(
            probe.packages.map((p) => [p.node, p.maxEnergyRangeUj]),
            [
                ["intel-rapl:0", 100n],
                ["intel-rapl:1", 200n],
            ],
        );
    });
});
