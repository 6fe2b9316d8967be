import process from "node:process";
import { parseArgs } from "node:util";
import { readDataset } from "../../dataset/dataset.js";
import { buildReport, formatReport } from "../report.js";
import { printHelp } from "./help-command.js";

export async function summarizeCommand(argv: string[] = process.argv.slice(3)) {
    const { values, positionals } = parseArgs({
        args: argv,
        options: {
            help: { type: "boolean" },
            json: { type: "boolean" },
        },
        allowPositionals: true,
    });

    if (values.help) {
        printHelp();
        return;
    }

    const [file] = positionals;
    if (file === undefined) {
        throw new Error("summarize: missing <dataset.json>");
    }

    const dataset = await readDataset(file);
    const report = buildReport(dataset.sources, dataset.faults, { command: dataset.command });

    if (values.json) {
        console.log(JSON.stringify({ createdAt: dataset.createdAt, ...report }, null, 2));
        return;
    }

    console.log(`Dataset: ${file} (recorded ${dataset.createdAt}, every ${dataset.intervalMs} ms)`);
    console.log(formatReport(report));
}
