import fastify from "fastify";
import type { Collector, Logger } from "@powerprof/core";

export interface ServerOptions {
    logger: Logger;
}

/**
 * HTTP view of a running collector.
 *
 * GET /status      collector state and per-monitor counters
 * GET /statistics  statistics of every monitor's buffer
 */
export async function buildServer(collector: Collector, options: ServerOptions) {
    const app = fastify({ logger: options.logger.child({ component: "http" }) });

    app.get("/status", async () => {
        const status = collector.getStatus();
        const degraded = status.monitors.some((m) => m.state === "stopped" && m.lastError !== null);
        return {
            status: degraded ? "DEGRADED" : "OK",
            timestamp: new Date().toISOString(),
            collector: status,
        };
    });

    app.get("/statistics", async () => {
        return {
            timestamp: new Date().toISOString(),
            sources: collector.getStatistics(),
        };
    });

    return app;
}
