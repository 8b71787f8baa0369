import { Command } from "commander";
import chalk from "chalk";
import { SearchEngine, catalogFromDefinitions, loadConfig, setLogLevel } from "@novelseek/core";

import { formatFailures, formatPlan, formatProgress, formatResults, toJson } from "./format.js";

interface SearchCommandOptions {
    source?: string[];
    config?: string;
    json?: boolean;
    dryRun?: boolean;
}

export const searchCommand = new Command("search")
    .description("Search every source at once and print the merged results")
    .argument("<query...>", "search terms")
    .option("-s, --source <refs...>", "source URLs or hostnames (default: every configured host)")
    .option("-c, --config <path>", "path to novelseek.yaml")
    .option("--json", "print the report as JSON")
    .option("--dry-run", "only list the sources that would be queried")
    .action(async (words: string[], options: SearchCommandOptions) => {
        const config = loadConfig(options.config);
        setLogLevel(config.logging.level);

        const catalog = catalogFromDefinitions(config.sources);
        const references = options.source ?? config.sources.flatMap((s) => s.hosts);
        const engine = new SearchEngine(catalog, config.search);
        const query = words.join(" ");

        if (options.dryRun) {
            console.log(chalk.blue(`[novelseek] Sources for "${query}":`));
            console.log(formatPlan(engine.plan(references)));
            return;
        }

        if (references.length === 0) {
            console.log(chalk.yellow("[novelseek] No sources configured. Add some under `sources:` in novelseek.yaml."));
            return;
        }

        const report = await engine.runSearch(query, references, {
            onProgress: (percent) => {
                if (!options.json) process.stderr.write(`\r${formatProgress(percent)}`);
            },
        });

        if (options.json) {
            console.log(toJson(report));
            return;
        }

        process.stderr.write("\n");
        console.log(formatResults(report.results));
        const failures = formatFailures(report);
        if (failures) console.error(failures);
    });
