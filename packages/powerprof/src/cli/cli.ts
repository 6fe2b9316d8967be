#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { errorMessage } from "@powerprof/core";
import { printHelp } from "./command/help-command.js";
import { profileCommand } from "./command/profile-command.js";
import { serveCommand } from "./command/serve-command.js";
import { summarizeCommand } from "./command/summarize-command.js";

const VALID_COMMANDS = new Set(["profile", "summarize", "serve", "help"]);

async function main(argv: string[] = process.argv.slice(2)) {
    const [command = "help", ...options] = argv;

    if (!VALID_COMMANDS.has(command)) {
        console.error(`[Message]: invalid command "${command}"`);
        printHelp();
        process.exitCode = 1;
        return;
    }

    switch (command) {
        case "profile":
            await profileCommand(options);
            break;
        case "summarize":
            await summarizeCommand(options);
            break;
        case "serve":
            await serveCommand(options);
            break;
        default:
            printHelp();
            break;
    }
}

await main().catch((err: unknown) => {
    console.error(errorMessage(err));
    printHelp();
    process.exit(1);
});
