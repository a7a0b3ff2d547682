#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { runChunks } from "./commands/chunks.js";
import { runInit } from "./commands/init.js";
import {
  runCombineCommand,
  runFetchCommand,
  runPipelineCommand,
} from "./commands/run.js";
import { DEFAULT_CONFIG_PATH } from "./utils/config.js";

const program = new Command();

program
  .name("rtpipe")
  .description("Fetch RescueTime activity per domain and combine it into Parquet files by group")
  .version("0.1.0");

function withConfig(command: Command): Command {
  return command.option(
    "-c, --config <path>",
    "path to the YAML configuration file",
    DEFAULT_CONFIG_PATH
  );
}

function withFilters(command: Command): Command {
  return command
    .option("--domain <name>", "only fetch this domain")
    .option("--group <name>", "only fetch domains in this group")
    .option("--subgroup <name>", "only fetch domains in this subgroup");
}

function withCombineSkips(command: Command): Command {
  return command
    .option("--skip-subgroups", "do not combine data by subgroup")
    .option("--skip-groups", "do not combine data by main group")
    .option("--skip-all", "do not combine all domains together");
}

withCombineSkips(
  withFilters(
    withConfig(
      program
        .command("run", { isDefault: true })
        .description("Fetch data for every domain, then combine it (default)")
    )
  )
)
  .option("--skip-fetch", "skip the data fetching phase")
  .option("--skip-combine", "skip the data combination phase")
  .action(runPipelineCommand);

withFilters(
  withConfig(program.command("fetch").description("Only fetch per-domain data"))
).action(runFetchCommand);

withCombineSkips(
  withConfig(
    program.command("combine").description("Only combine existing per-domain data")
  )
).action(runCombineCommand);

withConfig(
  program.command("chunks").description("Show the date chunks a fetch would request")
)
  .option("--chunk-months <n>", "override settings.chunk_months")
  .action(runChunks);

program
  .command("init [path]")
  .description("Create a starter configuration file")
  .action(runInit);

await program.parseAsync();
