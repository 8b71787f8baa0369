#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@novelseek/core";

import { searchCommand } from "./search.js";
import { sourcesCommand } from "./sources.js";

const program = new Command();

program
    .name("novelseek")
    .description("Search many sites at once and merge what they find")
    .version(VERSION);

program.addCommand(searchCommand);
program.addCommand(sourcesCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});
