import {
    Collector,
    ConfigError,
    type Logger,
    Monitor,
    NvidiaSmiSource,
    type PowerSource,
    RedfishPowerSource,
    createRaplSources,
    errorMessage,
    raplProbe,
} from "@powerprof/core";
import type { ProfilerConfig, SourceConfig } from "../config/config.js";

interface NamedSource {
    name: string;
    source: PowerSource;
    intervalMs?: number;
}

async function resolveSources(config: SourceConfig, logger: Logger): Promise<NamedSource[]> {
    switch (config.type) {
        case "rapl": {
            const probe = await raplProbe(config.basePath);
            if (probe.status !== "OK") {
                logger.warn({ status: probe.status, hint: probe.hint }, "RAPL probe did not succeed");
            }
            return createRaplSources(probe, logger).map(({ name, source }) => ({
                name: config.name ? name.replace(/^rapl/, config.name) : name,
                source,
                intervalMs: config.intervalMs,
            }));
        }

        case "nvidia-smi":
            return [
                {
                    name: config.name ?? "gpu",
                    source: new NvidiaSmiSource({
                        gpuIds: config.gpuIds,
                        binary: config.binary,
                        timeoutMs: config.timeoutMs,
                    }),
                    intervalMs: config.intervalMs,
                },
            ];

        case "redfish":
            return [
                {
                    name: config.name ?? "system",
                    source: new RedfishPowerSource({
                        host: config.host,
                        username: config.username,
                        password: config.password,
                        chassisId: config.chassisId,
                        insecureTls: config.insecureTls,
                        timeoutMs: config.timeoutMs,
                    }),
                    intervalMs: config.intervalMs,
                },
            ];
    }
}

/**
 * One monitor per power source the configuration resolves to, gathered in
 * a collector. Throws a `ConfigError` when nothing usable is left.
 */
export async function buildCollector(config: ProfilerConfig, logger: Logger): Promise<Collector> {
    const collector = new Collector({ logger });

    for (const sourceConfig of config.sources) {
        for (const { name, source, intervalMs } of await resolveSources(sourceConfig, logger)) {
            const monitor = new Monitor({
                name,
                source,
                intervalMs: intervalMs ?? config.intervalMs,
                consecutiveFailureThreshold: config.consecutiveFailureThreshold,
                stopTimeoutMs: config.stopTimeoutMs,
                logger,
            });
            try {
                collector.add(monitor);
            } catch (error) {
                throw new ConfigError(`${errorMessage(error)}: give each source a distinct "name"`);
            }
        }
    }

    if (collector.names().length === 0) {
        throw new ConfigError("no usable power source: check the RAPL permissions or configure another source");
    }
    return collector;
}

/** Releases what the sources hold (HTTP pools); errors are logged. */
export async function closeSources(collector: Collector, logger: Logger): Promise<void> {
    const monitors = collector.list();
    const outcomes = await Promise.allSettled(monitors.map((monitor) => monitor.source.close?.()));
    outcomes.forEach((outcome, i) => {
        if (outcome.status === "rejected") {
            logger.warn({ monitor: monitors[i]?.name, err: outcome.reason }, "closing source failed");
        }
    });
}
