import chalk from "chalk";
import type {
  ActivitySource,
  CombineMode,
  CombineSkips,
  DomainFilter,
  PipelineConfig,
} from "../types.js";
import {
  combineDatasets,
  type CombineOptions,
  type CombineReport,
} from "../pipeline/combiner.js";
import { fetchDomains, type FetchReport, type FetchReporter } from "../pipeline/fetcher.js";
import { describeFilter, hasFilter, selectDomains } from "../pipeline/filters.js";
import { listDateChunks } from "../pipeline/chunker.js";
import { createSpinnerReporter } from "../output/progress.js";
import { renderSummary, summarizeDataset } from "../output/summary.js";
import { createRescueTimeSource } from "../utils/api.js";
import {
  ALL_GROUP_NAME,
  getApiKey,
  getSubgroups,
  getTopLevelGroups,
  loadConfig,
} from "../utils/config.js";
import { ConfigError, errorMessage } from "../utils/errors.js";
import { formatElapsed, pluralize } from "../utils/format.js";
import { consoleLogger, silentLogger, type Logger } from "../utils/logger.js";

export interface PipelineOptions extends DomainFilter, CombineSkips {
  skipFetch?: boolean;
  skipCombine?: boolean;
}

export interface PipelineDependencies {
  /** Only called when the fetch phase runs. */
  createSource: () => ActivitySource;
  logger?: Logger;
  reporter?: FetchReporter;
  onCombined?: CombineOptions["onCombined"];
}

export interface PipelineReport {
  fetch: FetchReport | null;
  combine: CombineReport | null;
}

export interface RunCommandOptions extends PipelineOptions {
  config: string;
}

/**
 * Fetch, then combine. Filters and credentials are resolved before any
 * request or file write, so configuration problems stop the run up front.
 */
export async function runPipeline(
  config: PipelineConfig,
  options: PipelineOptions,
  deps: PipelineDependencies
): Promise<PipelineReport> {
  const logger = deps.logger ?? silentLogger;
  const report: PipelineReport = { fetch: null, combine: null };

  if (options.skipFetch) {
    logger.step("Skipping data fetching phase");
  } else {
    const domains = selectDomains(config, options);
    const source = deps.createSource();

    logger.step("Starting data fetching phase");
    if (hasFilter(options)) {
      logger.dim(`Limited to ${describeFilter(options)}: ${pluralize(domains.length, "domain")}`);
    }
    report.fetch = await fetchDomains(config, domains, {
      source,
      reporter: deps.reporter,
      logger,
    });
    logger.step(
      `Data fetching phase complete: ${report.fetch.succeeded.length} succeeded, ${report.fetch.failed.length} failed`
    );
  }

  if (options.skipCombine) {
    logger.step("Skipping data combination phase");
  } else {
    logger.step("Starting data combination phase");
    report.combine = await combineDatasets(config, {
      skipSubgroups: options.skipSubgroups,
      skipGroups: options.skipGroups,
      skipAll: options.skipAll,
      logger,
      onCombined: deps.onCombined,
    });
    logger.step(
      `Data combination phase complete: ${pluralize(report.combine.written.length, "output file")}`
    );
    for (const result of report.combine.written) {
      logger.dim(`  - ${result.outputPath}`);
    }
  }

  return report;
}

export function printPipelineShape(config: PipelineConfig, logger: Logger): void {
  const chunks = listDateChunks(config.dates, config.settings.chunkMonths);
  logger.step("Pipeline configured for:");
  logger.info(`- ${pluralize(config.domains.length, "domain")}`);
  logger.info(`- ${pluralize(getTopLevelGroups(config).length, "main group")}`);
  logger.info(`- ${pluralize(getSubgroups(config).length, "subgroup")}`);
  logger.info(
    `- Date range: ${config.dates.startDate} to ${config.dates.endDate} (${pluralize(chunks.length, "chunk")} of up to ${config.settings.chunkMonths} months)`
  );
}

function summaryTitle(mode: CombineMode, name: string): string {
  if (mode === "all" || name === ALL_GROUP_NAME) return "All domains";
  return `${mode === "subgroup" ? "Subgroup" : "Group"} ${name}`;
}

export async function runPipelineCommand(options: RunCommandOptions): Promise<void> {
  const logger = consoleLogger;
  const startedAt = Date.now();

  try {
    logger.step(`Loading configuration from ${options.config}`);
    const config = loadConfig(options.config, logger);
    printPipelineShape(config, logger);

    const report = await runPipeline(config, options, {
      createSource: () => createRescueTimeSource(getApiKey()),
      logger,
      reporter: createSpinnerReporter(logger),
      onCombined: (result, records) => {
        console.log(renderSummary(summaryTitle(result.mode, result.name), summarizeDataset(records)));
      },
    });

    const failed = report.fetch?.failed.length ?? 0;
    const skipped = report.combine?.skipped.length ?? 0;
    logger.step("Pipeline complete");
    if (failed > 0 || skipped > 0) {
      logger.info(
        chalk.yellow(
          `Finished with warnings: ${pluralize(failed, "failed domain")}, ${pluralize(skipped, "skipped aggregate")}`
        )
      );
    }
    if (report.combine) {
      for (const result of report.combine.written) {
        if (result.missing.length > 0) {
          logger.dim(
            `${result.outputPath} was written without ${result.missing.join(", ")}`
          );
        }
      }
    }
    logger.dim(`Total execution time: ${formatElapsed(Date.now() - startedAt)}`);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`Pipeline failed: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}

export async function runFetchCommand(options: RunCommandOptions): Promise<void> {
  await runPipelineCommand({ ...options, skipFetch: false, skipCombine: true });
}

export async function runCombineCommand(options: RunCommandOptions): Promise<void> {
  await runPipelineCommand({ ...options, skipFetch: true, skipCombine: false });
}
