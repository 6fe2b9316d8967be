import { InvalidReadingError } from "../errors/errors.js";

export type MetadataValue =
    | string
    | number
    | boolean
    | null
    | MetadataValue[]
    | { [key: string]: MetadataValue };

export type ReadingMetadata = Readonly<Record<string, MetadataValue>>;

export interface Reading {
    /** Wall-clock time of the sample, ms since the Unix epoch. */
    readonly timestamp: number;
    readonly powerWatts: number;
    readonly metadata: ReadingMetadata;
}

export interface SerializedReading {
    timestamp: string;
    powerWatts: number;
    metadata: Record<string, MetadataValue>;
}

export function isValidPower(powerWatts: number): boolean {
    return Number.isFinite(powerWatts) && powerWatts >= 0;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

export function createReading(
    timestamp: number,
    powerWatts: number,
    metadata: Record<string, MetadataValue> = {},
): Reading {
    if (!Number.isFinite(timestamp)) {
        throw new InvalidReadingError(`invalid timestamp: ${timestamp}`);
    }
    if (!isValidPower(powerWatts)) {
        throw new InvalidReadingError(`invalid power value: ${powerWatts}`);
    }
    return deepFreeze({
        timestamp,
        powerWatts,
        metadata: structuredClone(metadata),
    });
}

export function serializeReading(reading: Reading): SerializedReading {
    return {
        timestamp: new Date(reading.timestamp).toISOString(),
        powerWatts: reading.powerWatts,
        metadata: structuredClone(reading.metadata),
    };
}

function isMetadataValue(value: unknown): value is MetadataValue {
    if (value === null) return true;
    switch (typeof value) {
        case "string":
        case "boolean":
            return true;
        case "number":
            return Number.isFinite(value);
        case "object":
            if (Array.isArray(value)) return value.every(isMetadataValue);
            return Object.values(value).every(isMetadataValue);
        default:
            return false;
    }
}

function isMetadataRecord(value: unknown): value is Record<string, MetadataValue> {
    return typeof value === "object" && value !== null && !Array.isArray(value) && isMetadataValue(value);
}

/**
 * Rebuilds a reading from its serialized form (or from a reading-shaped
 * object with an epoch-ms timestamp).
 */
export function parseReading(value: unknown): Reading {
    if (typeof value !== "object" || value === null) {
        throw new InvalidReadingError("reading must be an object");
    }

    const rawTimestamp = "timestamp" in value ? value.timestamp : undefined;
    let timestamp: number;
    if (typeof rawTimestamp === "string") {
        timestamp = Date.parse(rawTimestamp);
    } else if (typeof rawTimestamp === "number") {
        timestamp = rawTimestamp;
    } else {
        throw new InvalidReadingError("reading.timestamp must be an ISO string or epoch ms");
    }

    const powerWatts = "powerWatts" in value ? value.powerWatts : undefined;
    if (typeof powerWatts !== "number") {
        throw new InvalidReadingError("reading.powerWatts must be a number");
    }

    const metadata = "metadata" in value && value.metadata !== undefined ? value.metadata : {};
    if (!isMetadataRecord(metadata)) {
        throw new InvalidReadingError("reading.metadata must be an object of JSON values");
    }

    return createReading(timestamp, powerWatts, metadata);
}
