import { Command } from "commander";
import chalk from "chalk";
import { catalogFromDefinitions, loadConfig } from "@novelseek/core";

export const sourcesCommand = new Command("sources")
    .description("List configured sources and their hosts")
    .option("-c, --config <path>", "path to novelseek.yaml")
    .action(async (options: { config?: string }) => {
        const config = loadConfig(options.config);
        const entries = catalogFromDefinitions(config.sources).list();

        if (entries.length === 0) {
            console.log(chalk.dim("No sources configured."));
            return;
        }
        for (const { id, hosts } of entries) {
            console.log(`${chalk.bold(id)}  ${chalk.dim(hosts.join(", "))}`);
        }
    });
