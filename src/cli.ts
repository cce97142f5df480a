#!/usr/bin/env node
/**
 * modweave CLI: scan a source tree and write one combined file in dependency order.
 */

import chalk from "chalk";
import { Command, Option } from "commander";
import { resolveRunOptions, type CliFlags } from "./cli/options.js";
import { loadWeaveConfig } from "./config/weaveYaml.js";
import { dependencyReport, weave, writeNotebook, writeOutput } from "./pipeline/runWeave.js";
import { SUMMARY_LEVELS } from "./transform/rules.js";
import { formatError } from "./util/errors.js";
import { createLogger, setDebugMode } from "./util/logger.js";
import { TOOL_NAME, TOOL_VERSION } from "./version.js";

const log = createLogger(TOOL_NAME);

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function run(root: string, flags: CliFlags): void {
  const config = loadWeaveConfig(root, flags.config);
  const opts = resolveRunOptions(root, flags, config);
  setDebugMode(opts.debug);

  const result = weave({
    root: opts.root,
    level: opts.level,
    exclude: opts.exclude,
    excludePath: opts.excludePath,
    extensions: opts.extensions,
    rules: opts.rules,
    labels: opts.labels,
    removeDisconnected: opts.removeDisconnected,
  });

  const written = writeOutput(opts.out, result.artifact);
  log.info(chalk.green(`wrote ${result.table.size} modules (${opts.level}) to ${written}`));

  if (result.ordering.kind === "cyclic") {
    log.warn(
      chalk.yellow(`${result.ordering.cycles.length} circular dependencies; used discovery order`),
    );
  }

  if (opts.notebook !== null) {
    const nb = writeNotebook(opts.notebook, result);
    log.info(chalk.green(`wrote notebook ${nb}`));
  }

  if (opts.report) {
    console.log(dependencyReport(result));
  }
}

function main(): void {
  const program = new Command();
  program
    .name(TOOL_NAME)
    .version(TOOL_VERSION)
    .description("Concatenate a tree of modules into one file, dependencies first")
    .argument("[root]", "directory to scan", "src")
    .option("-o, --out <file>", "artifact path")
    .addOption(new Option("-l, --level <level>", "summarization level").choices([...SUMMARY_LEVELS]))
    .option("-e, --exclude <substring>", "skip modules whose path contains this (repeatable)", collect, [])
    .option("--exclude-path <file>", "never scan this file")
    .option("--ext <extension>", "source file extension (repeatable)", collect, [])
    .option("--notebook [file]", "also write a notebook")
    .option("--report", "print a dependency report")
    .addOption(new Option("--labels <mode>", "graph node labels").choices(["letters", "numbers"]))
    .option("--remove-disconnected", "leave unconnected modules out of the graph picture")
    .option("-c, --config <file>", "config file (default <root>/.modweave.yml)")
    .option("--debug", "verbose scan and graph output")
    .action((root: string, flags: CliFlags) => {
      try {
        run(root, flags);
      } catch (err) {
        log.error(chalk.red(formatError(err)));
        process.exitCode = 1;
      }
    });

  program.parse(process.argv);
}

main();
