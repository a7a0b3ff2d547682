import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { FetchReporter } from "../pipeline/fetcher.js";
import { describeContext } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

/** One spinner per domain; its text follows the chunk being fetched. */
export function createSpinnerReporter(logger: Logger): FetchReporter {
  let spinner: Ora | null = null;

  return {
    domainStarted(domain, index, total) {
      const category = domain.subgroup ? `${domain.group}/${domain.subgroup}` : domain.group;
      logger.step(`Domain ${index}/${total}: ${domain.name} ${chalk.dim(`(${category})`)}`);
      spinner = ora(`Fetching ${domain.name}...`).start();
    },
    chunkStarted({ domain, chunk, index, total }) {
      if (spinner) {
        spinner.text = `Fetching ${domain.name}: chunk ${index}/${total} (${chunk.startDate} to ${chunk.endDate})`;
      }
    },
    domainFinished(result) {
      spinner?.succeed(
        `${result.domain.name}: ${result.rowCount} rows from ${result.chunkCount} chunks → ${result.outputPath}`
      );
      spinner = null;
    },
    domainFailed({ domain, error }) {
      spinner?.fail(`${domain.name}: fetch aborted`);
      spinner = null;
      logger.warn(`${error.message} (${describeContext(error.context)})`);
    },
  };
}
