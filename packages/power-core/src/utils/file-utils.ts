import fs from "node:fs/promises";
import { constants as F } from "node:fs";

export type AccessResult = { ok: true } | { ok: false; error: string };

const REASONS: Record<string, string> = {
    EACCES: "permission_denied",
    EPERM: "operation_not_permitted",
    ENOENT: "not_found",
    ELOOP: "symlink_loop",
    ENOTDIR: "not_a_directory",
    EISDIR: "is_a_directory",
};

export function reasonFromCode(code: string | undefined): string {
    if (!code) return "unknown";
    return REASONS[code] ?? code.toLowerCase();
}

export function extractErrorCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}

export async function accessReadable(file: string): Promise<AccessResult> {
    try {
        await fs.access(file, F.R_OK);
        return { ok: true };
    } catch (error) {
        return { ok: false, error: reasonFromCode(extractErrorCode(error)) };
    }
}

/**
 * Reads a small sysfs-style file and trims the trailing newline.
 * Resolves `null` instead of rejecting when the file cannot be read.
 */
export async function readTrimmedOrNull(file: string): Promise<string | null> {
    try {
        return (await fs.readFile(file, "utf-8")).trim();
    } catch {
        return null;
    }
}
