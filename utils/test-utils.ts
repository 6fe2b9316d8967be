import { join } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import type {
    CounterSample,
    EnergyCounter,
    PowerSample,
    PowerSource,
} from "../packages/power-core/src/index.js";

export function secondsToNs(n: number): bigint {
    return BigInt(Math.round(n * 1e9));
}

export async function createRaplPackages(
    baseDir: string,
    nodeName: string,
    { name = "package-0", energy = 0n, maxRange = 0n } = {},
) {
    const pkgDir = join(baseDir, nodeName);
    await mkdir(pkgDir, { recursive: true });

    const namePath = join(pkgDir, "name");
    const energyPath = join(pkgDir, "energy_uj");
    const maxRangePath = join(pkgDir, "max_energy_range_uj");

    await Promise.all([
        writeFile(namePath, `${name}\n`, "utf8"),
        writeFile(energyPath, `${energy}\n`, "utf8"),
        maxRange > 0n ? writeFile(maxRangePath, `${maxRange}\n`, "utf8") : null,
    ]);

    return { dir: pkgDir, files: { namePath, energyPath, maxRangePath } };
}

/** One scripted answer: watts, an error to throw, or a custom read. */
export type FakeStep = number | Error | ((signal?: AbortSignal) => Promise<PowerSample>);

/**
 * Power source replaying `steps` in order, then repeating the last one.
 */
export class FakeSource implements PowerSource {
    readonly kind: string;
    calls = 0;
    closed = false;
    private readonly steps: FakeStep[];

    constructor(steps: FakeStep[], kind = "fake") {
        if (steps.length === 0) throw new RangeError("FakeSource needs at least one step");
        this.steps = steps;
        this.kind = kind;
    }

    async read(signal?: AbortSignal): Promise<PowerSample> {
        const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
        this.calls++;
        if (typeof step === "number") return { powerWatts: step, metadata: { call: this.calls } };
        if (step instanceof Error) throw step;
        return step(signal);
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

/** Energy counter replaying `samples` in order. */
export class FakeCounter implements EnergyCounter {
    readonly kind = "fake-counter";
    private index = 0;

    constructor(private readonly samples: CounterSample[]) {}

    async read(): Promise<CounterSample> {
        const sample = this.samples[this.index];
        if (sample === undefined) throw new Error("FakeCounter exhausted");
        this.index++;
        return sample;
    }
}

/** Read that only settles when aborted, or never when `ignoreAbort` is set. */
export function hangingRead(ignoreAbort = false): (signal?: AbortSignal) => Promise<PowerSample> {
    return (signal) =>
        new Promise<PowerSample>((_resolve, reject) => {
            if (ignoreAbort) return;
            signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000, stepMs = 5): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!predicate()) {
        if (Date.now() > deadline) {
            throw new Error(`condition not met within ${timeoutMs}ms`);
        }
        await new Promise((resolve) => setTimeout(resolve, stepMs));
    }
}
