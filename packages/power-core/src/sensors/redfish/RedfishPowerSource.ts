import { Agent, type Dispatcher, request } from "undici";
import {
    type PowerSourceError,
    PermanentSourceError,
    TransientSourceError,
    errorMessage,
} from "../../errors/errors.js";
import type { MetadataValue } from "../../readings/reading.js";
import type { PowerSample, PowerSource } from "../../sources/PowerSource.js";
import { finiteNumberOrUndefined, isRecord } from "../../utils/guards.js";

export const DEFAULT_CHASSIS_ID = "System.Embedded.1";

export interface RedfishPowerSourceOptions {
    /** BMC address, optionally with a port (`10.0.0.12`, `bmc.local:8443`). */
    host: string;
    username: string;
    password: string;
    chassisId?: string;
    /** Accept self-signed BMC certificates. */
    insecureTls?: boolean;
    timeoutMs?: number;
    /** Custom undici dispatcher; takes precedence over `insecureTls`. */
    dispatcher?: Dispatcher;
}

/**
 * Whole-node power from a BMC (iDRAC, iLO, ...) through the Redfish
 * `Chassis/{id}/Power` resource.
 *
 * Status mapping:
 * - 401, 403, 404 and other 4xx: permanent (credentials, wrong chassis id);
 * - 408, 429, 5xx, network errors, timeouts: transient.
 */
export class RedfishPowerSource implements PowerSource {
    readonly kind = "redfish";
    readonly url: string;

    private readonly host: string;
    private readonly chassisId: string;
    private readonly authorization: string;
    private readonly timeoutMs: number;
    private readonly dispatcher: Dispatcher | undefined;
    private readonly ownedAgent: Agent | null;

    constructor(options: RedfishPowerSourceOptions) {
        if (!options.host) {
            throw new RangeError("redfish: host is required");
        }
        this.host = options.host;
        this.chassisId = options.chassisId ?? DEFAULT_CHASSIS_ID;
        this.url = `https://${this.host}/redfish/v1/Chassis/${encodeURIComponent(this.chassisId)}/Power`;
        this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`;
        this.timeoutMs = options.timeoutMs ?? 5000;

        if (options.dispatcher) {
            this.dispatcher = options.dispatcher;
            this.ownedAgent = null;
        } else if (options.insecureTls) {
            this.ownedAgent = new Agent({ connect: { rejectUnauthorized: false } });
            this.dispatcher = this.ownedAgent;
        } else {
            this.dispatcher = undefined;
            this.ownedAgent = null;
        }
    }

    async read(signal?: AbortSignal): Promise<PowerSample> {
        let response: Dispatcher.ResponseData;
        try {
            response = await request(this.url, {
                method: "GET",
                headers: {
                    accept: "application/json",
                    authorization: this.authorization,
                },
                dispatcher: this.dispatcher,
                signal,
                headersTimeout: this.timeoutMs,
                bodyTimeout: this.timeoutMs,
            });
        } catch (error) {
            throw new TransientSourceError(`redfish ${this.host}: ${errorMessage(error)}`, { cause: error });
        }

        const { statusCode, body } = response;
        if (statusCode < 200 || statusCode >= 300) {
            await body.dump();
            throw this.statusError(statusCode);
        }

        let payload: unknown;
        try {
            payload = await body.json();
        } catch (error) {
            throw new TransientSourceError(`redfish ${this.host}: invalid JSON payload`, { cause: error });
        }

        return this.toSample(payload);
    }

    /** Releases the connection pool created for `insecureTls`. */
    async close(): Promise<void> {
        await this.ownedAgent?.close();
    }

    private statusError(statusCode: number): PowerSourceError {
        const message = `redfish ${this.host}: GET ${this.url} returned HTTP ${statusCode}`;
        if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
            return new TransientSourceError(message);
        }
        if (statusCode >= 400) {
            return new PermanentSourceError(message);
        }
        return new TransientSourceError(message);
    }

    private toSample(payload: unknown): PowerSample {
        if (!isRecord(payload)) {
            throw new TransientSourceError(`redfish ${this.host}: Power resource is not an object`);
        }

        const controls = payload.PowerControl;
        const first: unknown = Array.isArray(controls) ? controls[0] : undefined;
        const control: Record<string, unknown> = isRecord(first) ? first : {};
        const powerWatts =
            finiteNumberOrUndefined(control.PowerConsumedWatts) ??
            finiteNumberOrUndefined(payload.PowerConsumedWatts);

        if (powerWatts === undefined) {
            throw new TransientSourceError(`redfish ${this.host}: PowerConsumedWatts missing from response`);
        }

        const rawMetrics = control.PowerMetrics;
        const metrics: Record<string, unknown> = isRecord(rawMetrics) ? rawMetrics : {};
        const metadata: Record<string, MetadataValue> = {
            host: this.host,
            chassisId: this.chassisId,
        };
        const optional: [string, unknown][] = [
            ["capacityWatts", control.PowerCapacityWatts],
            ["averageWatts", metrics.AverageConsumedWatts],
            ["maxWatts", metrics.MaxConsumedWatts],
            ["minWatts", metrics.MinConsumedWatts],
        ];
        for (const [key, raw] of optional) {
            const value = finiteNumberOrUndefined(raw);
            if (value !== undefined) metadata[key] = value;
        }

        return { powerWatts, metadata };
    }
}
