import chalk from "chalk";
import type { CombinedResult, SearchCapability, SearchReport } from "@novelseek/core";

export function formatProgress(percent: number): string {
    return `Searching… ${Math.floor(percent)}%`;
}

export function formatResults(results: readonly CombinedResult[]): string {
    if (results.length === 0) return chalk.dim("No results.");

    return results
        .map((result, i) => {
            const count = result.members.length;
            const header =
                `${chalk.bold(`${i + 1}.`)} ${chalk.white(result.title)} ` +
                chalk.dim(`(${count} source${count === 1 ? "" : "s"})`);
            const members = result.members.map(
                (m) => `   ${chalk.cyan(m.url)} ${chalk.dim(`[${m.sourceId}]`)}`,
            );
            return [header, ...members].join("\n");
        })
        .join("\n\n");
}

export function formatFailures(report: SearchReport): string {
    if (report.failures.length === 0) return "";
    const lines = report.failures.map((f) => `  ${f.sourceId}: ${f.reason}`);
    return chalk.yellow(`${report.failures.length} source(s) failed:\n${lines.join("\n")}`);
}

export function formatPlan(capabilities: readonly SearchCapability[]): string {
    if (capabilities.length === 0) return chalk.dim("No sources match.");
    return capabilities.map((c) => `  ${c.id}`).join("\n");
}

/** Machine-readable report: `{ query, progress, results, failures }`. */
export function toJson(report: SearchReport): string {
    return JSON.stringify(report, null, 2);
}
