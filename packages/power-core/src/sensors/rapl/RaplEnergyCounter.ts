import { readFile } from "node:fs/promises";
import { PermanentSourceError, TransientSourceError } from "../../errors/errors.js";
import { type Logger, silentLogger } from "../../logging/logger.js";
import { EnergyCounterAdapter } from "../../sources/EnergyCounterAdapter.js";
import type { CounterSample, EnergyCounter } from "../../sources/PowerSource.js";
import { nowNs } from "../../timers/timing.js";
import { extractErrorCode, reasonFromCode } from "../../utils/file-utils.js";
import type { RaplPackageInfo, RaplProbeResult } from "./rapl-probe.js";

const UJ_PER_JOULE = 1e6;

/** errno codes that will not go away by retrying */
const PERMANENT_CODES = new Set(["ENOENT", "EACCES", "EPERM", "ENOTDIR", "EISDIR"]);

/**
 * Raw `energy_uj` accessor for one RAPL package.
 */
export class RaplEnergyCounter implements EnergyCounter {
    readonly kind = "rapl";
    readonly node: string;
    readonly packageName: string;
    readonly file: string;

    constructor(pkg: Pick<RaplPackageInfo, "node" | "name" | "files">) {
        this.node = pkg.node;
        this.packageName = pkg.name;
        this.file = pkg.files.energyUj;
    }

    async read(signal?: AbortSignal): Promise<CounterSample> {
        let raw: string;
        try {
            raw = await readFile(this.file, { encoding: "utf-8", signal });
        } catch (error) {
            const code = extractErrorCode(error);
            const message = `rapl ${this.node}: cannot read ${this.file} (${reasonFromCode(code)})`;
            if (code !== undefined && PERMANENT_CODES.has(code)) {
                throw new PermanentSourceError(message, { cause: error });
            }
            throw new TransientSourceError(message, { cause: error });
        }
        const timeNs = nowNs();

        const text = raw.trim();
        if (!/^\d+$/.test(text)) {
            throw new TransientSourceError(`rapl ${this.node}: unparsable energy_uj value "${text}"`);
        }

        return {
            value: BigInt(text),
            timeNs,
            metadata: { node: this.node, package: this.packageName },
        };
    }
}

export interface RaplSource {
    /** Monitor name, e.g. `rapl-package-0`. */
    name: string;
    source: EnergyCounterAdapter;
}

/**
 * One power source per readable RAPL package of `probe`. Packages that are
 * unreadable or report no counter width are skipped with a warning.
 */
export function createRaplSources(probe: RaplProbeResult, logger: Logger = silentLogger()): RaplSource[] {
    if (probe.status === "FAILED") {
        logger.warn({ hint: probe.hint }, "RAPL not available");
        return [];
    }

    const sources: RaplSource[] = [];

    for (const pkg of probe.packages) {
        if (!pkg.hasEnergyReadable) {
            logger.warn({ node: pkg.node, reason: pkg.reason }, "skipping unreadable RAPL package");
            continue;
        }
        if (pkg.maxEnergyRangeUj === null) {
            logger.warn({ node: pkg.node }, "skipping RAPL package without max_energy_range_uj");
            continue;
        }

        sources.push({
            name: `rapl-${pkg.name}`,
            source: new EnergyCounterAdapter({
                counter: new RaplEnergyCounter(pkg),
                wrapMax: pkg.maxEnergyRangeUj,
                unitsPerJoule: UJ_PER_JOULE,
            }),
        });
    }

    return sources;
}
