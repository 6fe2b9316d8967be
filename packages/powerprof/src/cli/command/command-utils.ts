import { type ChildProcess, spawn } from "node:child_process";
import { once } from "node:events";
import os from "node:os";
import process from "node:process";
import type { LogLevel } from "@powerprof/core";

/**
 * Pulls -v / -vv / --verbose out of `args`.
 * 0 => warnings and errors only
 * 1 => info (monitor lifecycle)
 * 2 => debug (every skipped tick)
 */
export function extractVerbosity(args: string[]) {
    let level = 0;
    const rest: string[] = [];

    for (const arg of args) {
        if (arg === "--verbose" || arg === "-v") {
            level += 1;
            continue;
        }
        if (/^-v{2,}$/.test(arg)) {
            level += arg.length - 1;
            continue;
        }
        rest.push(arg);
    }

    return { level, rest };
}

/** `undefined` at 0: the logger then reads POWERPROF_LOG_LEVEL, else warn. */
export function verbosityToLogLevel(level: number): LogLevel | undefined {
    if (level >= 2) return "debug";
    if (level === 1) return "info";
    return undefined;
}

/**
 * Splits `args` at the first `--`: what comes after is the command to
 * profile, passed through untouched.
 */
export function splitAtDoubleDash(args: string[]): { options: string[]; command: string[] } {
    const index = args.indexOf("--");
    if (index === -1) return { options: args, command: [] };
    return { options: args.slice(0, index), command: args.slice(index + 1) };
}

export async function killGracefully(child: ChildProcess, timeoutMs = 2000): Promise<void> {
    if (!child.pid) return;
    if (child.exitCode !== null || child.signalCode !== null) return;

    // an "error" event also means there is nothing left to wait for
    const exited = once(child, "exit").then(
        () => true,
        () => true,
    );
    child.kill("SIGTERM");

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const ok = await Promise.race([exited, timedOut]);
    clearTimeout(timer);

    if (!ok && child.exitCode === null) {
        child.kill("SIGKILL");
    }
}

/**
 * Spawns `argv` without a shell and resolves once the process is running.
 */
export async function spawnTarget(argv: string[]): Promise<ChildProcess> {
    const [cmd, ...args] = argv;
    if (cmd === undefined || cmd === "") {
        throw new Error("profile: the command after -- is empty");
    }

    const executable = cmd === "node" ? process.execPath : cmd;
    const child = spawn(executable, args, { shell: false, stdio: "inherit" });

    await new Promise<void>((resolve, reject) => {
        child.once("spawn", () => resolve());
        child.once("error", (error) => reject(new Error(`cannot run ${cmd}: ${error.message}`, { cause: error })));
    });
    return child;
}

/** Shell convention: a process killed by a signal exits with 128 + its number. */
export function exitCodeFromExit(code: number | null, signal: NodeJS.Signals | null): number | null {
    if (code !== null) return code;
    if (signal !== null) return 128 + os.constants.signals[signal];
    return null;
}

export function parsePositiveNumberFromCommand(name: string, v: string | undefined, fallback: number): number {
    const n = v === undefined ? fallback : Number(v);
    if (!Number.isFinite(n) || n <= 0) {
        throw new Error(`${name} must be a positive number`);
    }
    return n;
}

export function parsePortFromCommand(name: string, v: string | undefined, fallback: number): number {
    const port = v === undefined ? fallback : Number(v);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`${name} must be a port number (0-65535)`);
    }
    return port;
}
