import { readFile, writeFile } from "node:fs/promises";
import {
    type CollectionResult,
    type ErrorSummary,
    PowerProfilerError,
    type Reading,
    type SerializedReading,
    errorMessage,
    isRecord,
    parseReading,
    serializeReading,
} from "@powerprof/core";

export const DATASET_VERSION = 1;

/** On-disk form of one profiling run. */
export interface Dataset {
    version: number;
    createdAt: string;
    command?: string[];
    intervalMs: number;
    sources: Record<string, SerializedReading[]>;
    faults: Record<string, ErrorSummary>;
}

export interface LoadedDataset {
    createdAt: string;
    command?: string[];
    intervalMs: number;
    sources: Record<string, Reading[]>;
    faults: Record<string, ErrorSummary>;
}

export class DatasetError extends PowerProfilerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("INVALID_DATASET", message, options);
    }
}

const FAULT_KINDS: readonly ErrorSummary["kind"][] = ["transient", "permanent", "unavailable", "internal"];

export function buildDataset(
    result: CollectionResult,
    options: { intervalMs: number; command?: string[]; createdAt?: Date },
): Dataset {
    const sources: Record<string, SerializedReading[]> = {};
    for (const [name, readings] of Object.entries(result.readings)) {
        sources[name] = readings.map(serializeReading);
    }
    return {
        version: DATASET_VERSION,
        createdAt: (options.createdAt ?? new Date()).toISOString(),
        ...(options.command && options.command.length > 0 ? { command: options.command } : {}),
        intervalMs: options.intervalMs,
        sources,
        faults: result.faults,
    };
}

export async function writeDataset(file: string, dataset: Dataset): Promise<void> {
    await writeFile(file, `${JSON.stringify(dataset, null, 2)}\n`, "utf-8");
}

function parseFault(name: string, raw: unknown): ErrorSummary {
    if (!isRecord(raw)) {
        throw new DatasetError(`faults.${name} must be an object`);
    }
    const kind = FAULT_KINDS.find((k) => k === raw.kind);
    const { code, message } = raw;
    if (kind === undefined || typeof code !== "string" || typeof message !== "string") {
        throw new DatasetError(`faults.${name} must be {kind, code, message}`);
    }
    return { kind, code, message };
}

export function parseDataset(raw: unknown): LoadedDataset {
    if (!isRecord(raw)) {
        throw new DatasetError("dataset must be a JSON object");
    }
    const { version, createdAt, intervalMs, command, sources, faults } = raw;

    if (version !== DATASET_VERSION) {
        throw new DatasetError(`dataset.version ${String(version)} is not supported (expected ${DATASET_VERSION})`);
    }

    if (typeof createdAt !== "string") {
        throw new DatasetError("dataset.createdAt must be a string");
    }
    if (typeof intervalMs !== "number" || !(intervalMs > 0)) {
        throw new DatasetError("dataset.intervalMs must be a positive number");
    }
    let commandArgs: string[] | undefined;
    if (command !== undefined) {
        if (!Array.isArray(command) || !command.every((arg) => typeof arg === "string")) {
            throw new DatasetError("dataset.command must be an array of strings");
        }
        commandArgs = command.map(String);
    }
    if (!isRecord(sources)) {
        throw new DatasetError("dataset.sources must be an object");
    }

    const readings: Record<string, Reading[]> = {};
    for (const [name, list] of Object.entries(sources)) {
        if (!Array.isArray(list)) {
            throw new DatasetError(`sources.${name} must be an array of readings`);
        }
        readings[name] = list.map((value: unknown, i: number) => {
            try {
                return parseReading(value);
            } catch (error) {
                throw new DatasetError(`sources.${name}[${i}]: ${errorMessage(error)}`, { cause: error });
            }
        });
    }

    const parsedFaults: Record<string, ErrorSummary> = {};
    if (faults !== undefined) {
        if (!isRecord(faults)) {
            throw new DatasetError("dataset.faults must be an object");
        }
        for (const [name, fault] of Object.entries(faults)) {
            parsedFaults[name] = parseFault(name, fault);
        }
    }

    return {
        createdAt,
        ...(commandArgs !== undefined ? { command: commandArgs } : {}),
        intervalMs,
        sources: readings,
        faults: parsedFaults,
    };
}

export async function readDataset(file: string): Promise<LoadedDataset> {
    let text: string;
    try {
        text = await readFile(file, "utf-8");
    } catch (error) {
        throw new DatasetError(`cannot read ${file}: ${errorMessage(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new DatasetError(`${file} is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
    return parseDataset(parsed);
}
