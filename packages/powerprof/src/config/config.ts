import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import {
    ConfigError,
    DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD,
    DEFAULT_STOP_TIMEOUT_MS,
    errorMessage,
    extractErrorCode,
    isRecord,
} from "@powerprof/core";

export const DEFAULT_CONFIG_FILE = "powerprof.config.json";
export const DEFAULT_INTERVAL_MS = 1000;

interface CommonSourceConfig {
    /** Monitor name; defaults per source type. */
    name?: string;
    /** Overrides the profile-wide interval for this source. */
    intervalMs?: number;
}

export interface RaplSourceConfig extends CommonSourceConfig {
    type: "rapl";
    /** powercap root, `/sys/class/powercap` unless set */
    basePath?: string;
}

export interface NvidiaSmiSourceConfig extends CommonSourceConfig {
    type: "nvidia-smi";
    gpuIds?: number[];
    binary?: string;
    timeoutMs?: number;
}

export interface RedfishSourceConfig extends CommonSourceConfig {
    type: "redfish";
    host: string;
    username: string;
    password: string;
    chassisId?: string;
    insecureTls?: boolean;
    timeoutMs?: number;
}

export type SourceConfig = RaplSourceConfig | NvidiaSmiSourceConfig | RedfishSourceConfig;

export interface ProfilerConfig {
    intervalMs: number;
    consecutiveFailureThreshold: number;
    stopTimeoutMs: number;
    sources: SourceConfig[];
}

export type Env = Record<string, string | undefined>;

export function defaultConfig(): ProfilerConfig {
    return {
        intervalMs: DEFAULT_INTERVAL_MS,
        consecutiveFailureThreshold: DEFAULT_CONSECUTIVE_FAILURE_THRESHOLD,
        stopTimeoutMs: DEFAULT_STOP_TIMEOUT_MS,
        sources: [{ type: "rapl" }],
    };
}

/* -------------------------------------------------------------------------- */
/*  Field readers                                                             */
/* -------------------------------------------------------------------------- */

function optionalPositive(obj: Record<string, unknown>, key: string, where: string): number | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${where}.${key} must be a positive number`);
    }
    return value;
}

function optionalNonNegativeInteger(obj: Record<string, unknown>, key: string, where: string): number | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new ConfigError(`${where}.${key} must be an integer >= 0`);
    }
    return value;
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "string" || value === "") {
        throw new ConfigError(`${where}.${key} must be a non-empty string`);
    }
    return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, where: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") {
        throw new ConfigError(`${where}.${key} must be a boolean`);
    }
    return value;
}

function optionalGpuIds(obj: Record<string, unknown>, where: string): number[] | undefined {
    const value = obj.gpuIds;
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
        throw new ConfigError(`${where}.gpuIds must be an array of GPU indices`);
    }
    const ids: number[] = [];
    for (const id of value) {
        if (typeof id !== "number" || !Number.isInteger(id) || id < 0) {
            throw new ConfigError(`${where}.gpuIds must be an array of GPU indices`);
        }
        ids.push(id);
    }
    return ids;
}

/** Config value, else environment variable, else error. */
function requiredWithEnv(
    obj: Record<string, unknown>,
    key: string,
    envName: string,
    env: Env,
    where: string,
): string {
    const value = optionalString(obj, key, where) ?? env[envName];
    if (value === undefined || value === "") {
        throw new ConfigError(`${where}.${key} is required (or set ${envName})`);
    }
    return value;
}

/* -------------------------------------------------------------------------- */
/*  Parsing                                                                   */
/* -------------------------------------------------------------------------- */

function parseSource(raw: unknown, index: number, env: Env): SourceConfig {
    const where = `sources[${index}]`;
    if (!isRecord(raw)) {
        throw new ConfigError(`${where} must be an object`);
    }

    const common: CommonSourceConfig = {
        name: optionalString(raw, "name", where),
        intervalMs: optionalPositive(raw, "intervalMs", where),
    };

    switch (raw.type) {
        case "rapl":
            return { type: "rapl", ...common, basePath: optionalString(raw, "basePath", where) };

        case "nvidia-smi":
            return {
                type: "nvidia-smi",
                ...common,
                gpuIds: optionalGpuIds(raw, where),
                binary: optionalString(raw, "binary", where),
                timeoutMs: optionalPositive(raw, "timeoutMs", where),
            };

        case "redfish":
            return {
                type: "redfish",
                ...common,
                host: requiredWithEnv(raw, "host", "REDFISH_HOST", env, where),
                username: requiredWithEnv(raw, "username", "REDFISH_USERNAME", env, where),
                password: requiredWithEnv(raw, "password", "REDFISH_PASSWORD", env, where),
                chassisId: optionalString(raw, "chassisId", where),
                insecureTls: optionalBoolean(raw, "insecureTls", where),
                timeoutMs: optionalPositive(raw, "timeoutMs", where),
            };

        default:
            throw new ConfigError(`${where}.type must be one of "rapl", "nvidia-smi", "redfish"`);
    }
}

/**
 * Validates a parsed JSON document into a `ProfilerConfig`; missing
 * top-level fields take their defaults.
 */
export function parseConfig(raw: unknown, env: Env = process.env): ProfilerConfig {
    if (!isRecord(raw)) {
        throw new ConfigError("config must be a JSON object");
    }
    const defaults = defaultConfig();

    let sources = defaults.sources;
    if (raw.sources !== undefined) {
        if (!Array.isArray(raw.sources) || raw.sources.length === 0) {
            throw new ConfigError("config.sources must be a non-empty array");
        }
        sources = raw.sources.map((source: unknown, i: number) => parseSource(source, i, env));
    }

    return {
        intervalMs: optionalPositive(raw, "intervalMs", "config") ?? defaults.intervalMs,
        consecutiveFailureThreshold:
            optionalNonNegativeInteger(raw, "consecutiveFailureThreshold", "config") ??
            defaults.consecutiveFailureThreshold,
        stopTimeoutMs: optionalPositive(raw, "stopTimeoutMs", "config") ?? defaults.stopTimeoutMs,
        sources,
    };
}

/**
 * Loads `configPath`, or `./powerprof.config.json` when it exists, or the
 * defaults (RAPL at 1000 ms).
 */
export async function loadConfig(configPath: string | undefined, env: Env = process.env): Promise<ProfilerConfig> {
    const file = configPath ?? path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);

    let text: string;
    try {
        text = await readFile(file, "utf-8");
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === "ENOENT" && configPath === undefined) {
            return defaultConfig();
        }
        if (code === "ENOENT") throw new ConfigError(`[--config]: no such file ${file}`);
        throw new ConfigError(`[--config]: cannot read ${file}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`[--config]: ${file} is not valid JSON: ${errorMessage(error)}`);
    }

    return parseConfig(parsed, env);
}
