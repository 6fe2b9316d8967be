import {
    type ErrorSummary,
    type PowerStatistics,
    type Reading,
    computeStatistics,
} from "@powerprof/core";

export interface SourceReport {
    name: string;
    statistics: PowerStatistics;
    fault?: ErrorSummary;
}

export interface ProfileReport {
    command?: string[];
    durationSeconds: number;
    sources: SourceReport[];
}

const RULE = "------------------------------";

export function buildReport(
    readings: Record<string, Reading[]>,
    faults: Record<string, ErrorSummary>,
    options: { durationSeconds?: number; command?: string[] } = {},
): ProfileReport {
    const names = [...new Set([...Object.keys(readings), ...Object.keys(faults)])];
    const sources = names.map((name): SourceReport => {
        const fault = faults[name];
        const statistics = computeStatistics(readings[name] ?? []);
        return fault ? { name, statistics, fault } : { name, statistics };
    });

    return {
        ...(options.command && options.command.length > 0 ? { command: options.command } : {}),
        durationSeconds:
            options.durationSeconds ?? Math.max(0, ...sources.map((source) => source.statistics.durationSeconds)),
        sources,
    };
}

function watts(value: number): string {
    return `${value.toFixed(2)} W`;
}

export function formatSource({ name, statistics: s, fault }: SourceReport): string[] {
    const lines = [name];
    if (s.empty) {
        lines.push("  No readings");
    } else {
        lines.push(
            `  Readings: ${s.count}`,
            `  Average: ${watts(s.average)}`,
            `  Peak: ${watts(s.peak)}`,
            `  Min: ${watts(s.min)}`,
            `  Median: ${watts(s.median)}`,
            `  Std dev: ${watts(s.stdDev)}`,
            `  P95: ${watts(s.percentiles.p95)}`,
            `  Energy: ${s.totalEnergyJoules.toFixed(3)} J (${(s.totalEnergyJoules / 3600).toFixed(4)} Wh)`,
        );
    }
    if (fault) {
        lines.push(`  FAULT (${fault.kind}): ${fault.message}`);
    }
    return lines;
}

export function formatReport(report: ProfileReport): string {
    const lines = ["==============================", "Power profile", RULE];
    if (report.command) {
        lines.push(`Command: ${report.command.join(" ")}`);
    }
    lines.push(`Duration: ${report.durationSeconds.toFixed(2)} s`, RULE);
    for (const source of report.sources) {
        lines.push(...formatSource(source), RULE);
    }
    return lines.join("\n");
}
