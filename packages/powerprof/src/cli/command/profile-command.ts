import type { ChildProcess } from "node:child_process";
import { once } from "node:events";
import process from "node:process";
import { parseArgs } from "node:util";
import { createLogger, sleepMs } from "@powerprof/core";
import { loadConfig } from "../../config/config.js";
import { buildDataset, writeDataset } from "../../dataset/dataset.js";
import { buildCollector, closeSources } from "../../sources/buildCollector.js";
import { buildReport, formatReport } from "../report.js";
import {
    exitCodeFromExit,
    extractVerbosity,
    killGracefully,
    parsePositiveNumberFromCommand,
    spawnTarget,
    splitAtDoubleDash,
    verbosityToLogLevel,
} from "./command-utils.js";
import { printHelp } from "./help-command.js";

//parameter resolution order
//CLI FLAGS > CONFIG FILE > DEFAULTS

export async function profileCommand(argv: string[] = process.argv.slice(3)) {
    const { level: verbosity, rest } = extractVerbosity(argv);
    const { options, command } = splitAtDoubleDash(rest);

    const { values } = parseArgs({
        args: options,
        options: {
            help: { type: "boolean" },
            config: { type: "string" },
            duration: { type: "string" },
            interval: { type: "string" },
            json: { type: "boolean" },
            out: { type: "string" },
        },
    });

    if (values.help) {
        printHelp();
        return;
    }

    const durationSeconds =
        values.duration === undefined ? undefined : parsePositiveNumberFromCommand("--duration", values.duration, 10);
    if (durationSeconds === undefined && command.length === 0) {
        throw new Error('profile: give a command after "--" or a --duration');
    }

    const logger = createLogger("powerprof", { level: verbosityToLogLevel(verbosity) });

    const config = await loadConfig(values.config);
    if (values.interval !== undefined) {
        config.intervalMs = parsePositiveNumberFromCommand("--interval", values.interval, config.intervalMs);
    }

    const collector = await buildCollector(config, logger);

    const controller = new AbortController();
    const onSigint = () => {
        logger.info("SIGINT received, stopping");
        controller.abort();
    };
    process.once("SIGINT", onSigint);

    let child: ChildProcess | null = null;
    const target: { exitCode: number | null } = { exitCode: null };
    const onChildExit = (code: number | null, signal: NodeJS.Signals | null) => {
        target.exitCode = exitCodeFromExit(code, signal);
        controller.abort();
    };
    const startedAt = Date.now();

    try {
        await collector.start();
        logger.info({ monitors: collector.names(), intervalMs: config.intervalMs }, "profiling");

        if (command.length > 0) {
            child = await spawnTarget(command);
            child.once("exit", onChildExit);
        }

        if (durationSeconds !== undefined) {
            await sleepMs(durationSeconds * 1000, controller.signal);
        } else if (!controller.signal.aborted) {
            await once(controller.signal, "abort");
        }
    } catch (error) {
        await collector.stop();
        await closeSources(collector, logger);
        throw error;
    } finally {
        process.removeListener("SIGINT", onSigint);
        if (child) {
            // still running: the SIGTERM sent below is ours, not the command's exit status
            child.removeListener("exit", onChildExit);
            await killGracefully(child, 2000);
        }
    }

    const elapsedSeconds = (Date.now() - startedAt) / 1000;
    const result = await collector.stop();
    await closeSources(collector, logger);

    if (values.out) {
        await writeDataset(
            values.out,
            buildDataset(result, { intervalMs: config.intervalMs, command }),
        );
        logger.info({ file: values.out }, "dataset written");
    }

    const report = buildReport(result.readings, result.faults, { durationSeconds: elapsedSeconds, command });

    if (values.json) {
        console.log(JSON.stringify(report, null, 2));
    } else {
        console.log(formatReport(report));
        if (values.out) console.log(`Dataset: ${values.out}`);
    }

    if (target.exitCode !== null && target.exitCode !== 0) {
        process.exitCode = target.exitCode;
    }
}
