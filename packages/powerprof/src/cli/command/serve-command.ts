import { once } from "node:events";
import process from "node:process";
import { parseArgs } from "node:util";
import { createLogger } from "@powerprof/core";
import { loadConfig } from "../../config/config.js";
import { buildServer } from "../../server/server.js";
import { buildCollector, closeSources } from "../../sources/buildCollector.js";
import {
    extractVerbosity,
    parsePortFromCommand,
    parsePositiveNumberFromCommand,
    verbosityToLogLevel,
} from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function serveCommand(argv: string[] = process.argv.slice(3)) {
    const { level: verbosity, rest } = extractVerbosity(argv);

    const { values } = parseArgs({
        args: rest,
        options: {
            help: { type: "boolean" },
            config: { type: "string" },
            interval: { type: "string" },
            port: { type: "string" },
            host: { type: "string" },
        },
    });

    if (values.help) {
        printHelp();
        return;
    }

    const port = parsePortFromCommand("--port", values.port, 8080);
    const host = values.host ?? "127.0.0.1";
    const logger = createLogger("powerprof", { level: verbosityToLogLevel(verbosity) });

    const config = await loadConfig(values.config);
    if (values.interval !== undefined) {
        config.intervalMs = parsePositiveNumberFromCommand("--interval", values.interval, config.intervalMs);
    }

    const collector = await buildCollector(config, logger);
    const app = await buildServer(collector, { logger });

    const controller = new AbortController();
    const onSignal = () => controller.abort();
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    try {
        await collector.start();
        const address = await app.listen({ port, host });
        console.log(`powerprof listening on ${address} (GET /status, GET /statistics)`);
        await once(controller.signal, "abort");
    } finally {
        process.removeListener("SIGINT", onSignal);
        process.removeListener("SIGTERM", onSignal);
        await app.close();
        const { faults } = await collector.stop();
        await closeSources(collector, logger);
        for (const [name, fault] of Object.entries(faults)) {
            logger.warn({ monitor: name, fault }, "monitor ended with a fault");
        }
    }
}
