import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { PermanentSourceError, TransientSourceError, errorMessage } from "../../errors/errors.js";
import type { PowerSample, PowerSource } from "../../sources/PowerSource.js";
import { extractErrorCode } from "../../utils/file-utils.js";

const execFileAsync = promisify(execFile);

export const NVIDIA_SMI_QUERY = [
    "--query-gpu=index,name,power.draw,temperature.gpu,utilization.gpu,clocks.sm",
    "--format=csv,noheader,nounits",
] as const;

export interface CommandResult {
    stdout: string;
    stderr: string;
}

export type CommandRunner = (
    file: string,
    args: readonly string[],
    options: { timeoutMs: number; signal?: AbortSignal },
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (file, args, { timeoutMs, signal }) => {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
        encoding: "utf8",
        timeout: timeoutMs,
        signal,
    });
    return { stdout, stderr };
};

/** Per-GPU values of one query; `null` where the driver reports `[N/A]`. */
export type GpuStatus = {
    index: number;
    name: string;
    powerWatts: number | null;
    temperatureC: number | null;
    utilizationPercent: number | null;
    smClockMhz: number | null;
};

export interface NvidiaSmiSourceOptions {
    /** GPU indices to sum; every GPU in the output when omitted. */
    gpuIds?: readonly number[];
    binary?: string;
    timeoutMs?: number;
    runner?: CommandRunner;
}

function parseOptionalNumber(field: string): number | null {
    if (field === "" || field.startsWith("[")) return null;
    const value = Number(field);
    return Number.isFinite(value) ? value : null;
}

/**
 * Parses `nvidia-smi --format=csv,noheader,nounits` output of
 * {@link NVIDIA_SMI_QUERY}. Throws a `TransientSourceError` on a malformed
 * line: a truncated or interleaved output is retried on the next tick.
 */
export function parseNvidiaSmiOutput(stdout: string): GpuStatus[] {
    const gpus: GpuStatus[] = [];

    for (const line of stdout.split("\n")) {
        if (line.trim() === "") continue;

        const fields = line.split(",").map((field) => field.trim());
        const [index, name, power, temperature, utilization, clock] = fields;
        if (
            fields.length !== 6 ||
            index === undefined ||
            name === undefined ||
            power === undefined ||
            temperature === undefined ||
            utilization === undefined ||
            clock === undefined ||
            !/^\d+$/.test(index)
        ) {
            throw new TransientSourceError(`nvidia-smi: unexpected output line "${line.trim()}"`);
        }

        gpus.push({
            index: Number(index),
            name,
            powerWatts: parseOptionalNumber(power),
            temperatureC: parseOptionalNumber(temperature),
            utilizationPercent: parseOptionalNumber(utilization),
            smClockMhz: parseOptionalNumber(clock),
        });
    }

    return gpus;
}

/**
 * Board power of NVIDIA GPUs, summed over the selected indices.
 */
export class NvidiaSmiSource implements PowerSource {
    readonly kind = "nvidia-smi";

    private readonly gpuIds: ReadonlySet<number> | null;
    private readonly binary: string;
    private readonly timeoutMs: number;
    private readonly runner: CommandRunner;

    constructor(options: NvidiaSmiSourceOptions = {}) {
        this.gpuIds = options.gpuIds && options.gpuIds.length > 0 ? new Set(options.gpuIds) : null;
        this.binary = options.binary ?? "nvidia-smi";
        this.timeoutMs = options.timeoutMs ?? 2000;
        this.runner = options.runner ?? execFileRunner;
    }

    async read(signal?: AbortSignal): Promise<PowerSample> {
        const gpus = this.select(parseNvidiaSmiOutput(await this.query(signal)));

        if (gpus.length === 0) {
            const wanted = this.gpuIds ? [...this.gpuIds].join(",") : "any";
            throw new PermanentSourceError(`nvidia-smi: no GPU matching ids [${wanted}]`);
        }

        let powerWatts = 0;
        let reported = 0;
        for (const gpu of gpus) {
            if (gpu.powerWatts !== null) {
                powerWatts += gpu.powerWatts;
                reported++;
            }
        }
        if (reported === 0) {
            throw new PermanentSourceError("nvidia-smi: power.draw not supported on the selected GPUs");
        }

        return {
            powerWatts,
            metadata: {
                gpuCount: gpus.length,
                gpus,
            },
        };
    }

    private select(gpus: GpuStatus[]): GpuStatus[] {
        const ids = this.gpuIds;
        return ids ? gpus.filter((gpu) => ids.has(gpu.index)) : gpus;
    }

    private async query(signal?: AbortSignal): Promise<string> {
        try {
            const { stdout } = await this.runner(this.binary, NVIDIA_SMI_QUERY, {
                timeoutMs: this.timeoutMs,
                signal,
            });
            return stdout;
        } catch (error) {
            if (extractErrorCode(error) === "ENOENT") {
                throw new PermanentSourceError(`nvidia-smi: ${this.binary} not found`, { cause: error });
            }
            throw new TransientSourceError(`nvidia-smi: ${errorMessage(error)}`, { cause: error });
        }
    }
}
