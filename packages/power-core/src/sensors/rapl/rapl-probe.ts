import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { accessReadable, readTrimmedOrNull } from "../../utils/file-utils.js";

export type RaplStatus = "OK" | "DEGRADED" | "FAILED";
export type RaplVendor = "intel" | "amd" | "unknown";

export interface RaplPackageInfo {
    vendor: RaplVendor;
    /** Directory name under the powercap root, e.g. `intel-rapl:0`. */
    node: string;
    path: string;
    /** Content of the `name` file, e.g. `package-0`. */
    name: string;
    hasEnergyReadable: boolean;
    reason: string | null;
    /** Counter width in µJ; the counter wraps back to 0 past this value. */
    maxEnergyRangeUj: bigint | null;
    files: {
        energyUj: string;
        maxEnergyRangeUj: string;
    };
}

export interface RaplProbeResult {
    status: RaplStatus;
    vendor?: RaplVendor;
    packages: RaplPackageInfo[];
    hint: string | null;
}

export const DEFAULT_POWERCAP_PATH = "/sys/class/powercap";

function vendorOf(node: string): RaplVendor {
    if (node.startsWith("intel-rapl")) return "intel";
    if (node.startsWith("amd-rapl")) return "amd";
    return "unknown";
}

function parseCounterWidth(content: string | null): bigint | null {
    if (content === null || !/^\d+$/.test(content)) return null;
    const value = BigInt(content);
    return value > 0n ? value : null;
}

/**
 * Probes the RAPL (Running Average Power Limit) counters the Linux kernel
 * exposes under the `powercap` sysfs tree.
 *
 * Every directory of `basePath` whose `name` file contains `package-` is
 * reported with:
 * - whether `energy_uj` is readable, and if not why (`permission_denied`, ...);
 * - the counter width read from `max_energy_range_uj`, when present;
 * - the vendor, deduced from the `intel-rapl` / `amd-rapl` node prefix.
 *
 * Status:
 * - `OK`: at least one package has a readable `energy_uj`;
 * - `DEGRADED`: packages exist but none is readable (usually root-only);
 * - `FAILED`: `basePath` is missing or holds no package.
 *
 * File system errors are folded into the result; this function never throws.
 *
 * @param basePath powercap root, overridable for fake sysfs trees in tests.
 */
export async function raplProbe(basePath: string = DEFAULT_POWERCAP_PATH): Promise<RaplProbeResult> {
    let dirEntries: Dirent[];
    try {
        dirEntries = await fs.readdir(basePath, { withFileTypes: true });
    } catch {
        return { status: "FAILED", packages: [], hint: `${basePath} not found` };
    }

    const packages: RaplPackageInfo[] = [];

    for (const entry of dirEntries) {
        if (!entry.isDirectory() && !entry.isSymbolicLink()) {
            continue;
        }

        const node = entry.name;
        const packagePath = path.join(basePath, node);
        const name = await readTrimmedOrNull(path.join(packagePath, "name"));

        if (name === null || !name.includes("package-")) {
            continue;
        }

        const energyPath = path.join(packagePath, "energy_uj");
        const maxRangePath = path.join(packagePath, "max_energy_range_uj");

        const [readable, maxRangeContent] = await Promise.all([
            accessReadable(energyPath),
            readTrimmedOrNull(maxRangePath),
        ]);

        packages.push({
            vendor: vendorOf(node),
            node,
            path: packagePath,
            name,
            hasEnergyReadable: readable.ok,
            reason: readable.ok ? null : readable.error,
            maxEnergyRangeUj: parseCounterWidth(maxRangeContent),
            files: {
                energyUj: energyPath,
                maxEnergyRangeUj: maxRangePath,
            },
        });
    }

    // readdir order is file system dependent
    packages.sort((a, b) => a.node.localeCompare(b.node));

    const [first] = packages;
    if (first === undefined) {
        return {
            status: "FAILED",
            packages: [],
            hint: `No RAPL packages (intel-rapl:N or amd-rapl:N) found in ${basePath}. VM without powercap ?`,
        };
    }

    const readablePackage = packages.find((p) => p.hasEnergyReadable);

    return {
        status: readablePackage ? "OK" : "DEGRADED",
        vendor: (readablePackage ?? first).vendor,
        packages,
        hint: readablePackage ? null : "RAPL energy_uj files are not readable (permission denied ?)",
    };
}
